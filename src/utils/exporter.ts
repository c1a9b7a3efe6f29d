import ExcelJS from 'exceljs';
import fs from 'fs-extra';
import path from 'path';
import { DriftReport } from '../types/comparison.js';
import { logger } from './logger.js';

const COLUMNS = [
  { header: 'Category', key: 'category', width: 16 },
  { header: 'Change', key: 'change', width: 20 },
  { header: 'Object', key: 'name', width: 50 },
  { header: 'Details', key: 'details', width: 70 },
];

export class DriftExporter {
  static async exportToSheet(report: DriftReport, outputPath: string) {
    fs.ensureDirSync(path.dirname(outputPath));
    const ext = path.extname(outputPath).toLowerCase();

    const workbook = this.buildWorkbook(report, ext !== '.csv');
    if (ext === '.csv') {
      await workbook.csv.writeFile(outputPath);
      logger.info(`Drift report exported to CSV: ${outputPath}`);
    } else {
      await workbook.xlsx.writeFile(outputPath);
      logger.info(`Drift report exported to Excel: ${outputPath}`);
    }
  }

  static buildWorkbook(report: DriftReport, styled: boolean = true): ExcelJS.Workbook {
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Drift');
    sheet.columns = styled ? COLUMNS : COLUMNS.map(({ header, key }) => ({ header, key }));

    if (styled) {
      sheet.getRow(1).font = { bold: true };
      sheet.getRow(1).fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FFE0E0E0' },
      };
    }

    report.items.forEach(item => {
      sheet.addRow({
        category: item.category,
        change: item.change.replace(/_/g, ' '),
        name: item.name,
        details: item.details || '-',
      });
    });

    if (styled && report.rowCounts.length > 0) {
      const counts = workbook.addWorksheet('Row counts');
      counts.columns = [
        { header: 'Table', key: 'table', width: 40 },
        { header: report.sourceEnv, key: 'source', width: 15 },
        { header: report.targetEnv, key: 'target', width: 15 },
      ];
      counts.getRow(1).font = { bold: true };
      report.rowCounts.forEach(row => counts.addRow(row));
    }

    return workbook;
  }
}
