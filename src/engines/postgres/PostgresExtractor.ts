import Cursor from 'pg-cursor';
import { TableRef } from '../../types/index.js';
import { qualify, quoteIdent, quoteLiteral } from '../../utils/sql.js';
import { IDataExtractor, IDbConnection, IStreamingConnection } from '../interfaces.js';

/** A column the extractor copies; generated columns are left to the target. */
export interface ExtractedColumn {
  name: string;
  /** pg_attribute.attidentity: 'a' always, 'd' by default, '' plain. */
  identity: string;
}

type TextRow = Record<string, string | null>;

/**
 * Row-by-row fallback used when pg_dump cannot reach the source. Every value
 * is read as its text representation and written back as a literal, so the
 * target column type does the parsing.
 */
export class PostgresExtractor implements IDataExtractor {
  async *streamTableData(db: IStreamingConnection, table: TableRef, chunkSize: number = 1000): AsyncGenerator<string[]> {
    const columns = await this.describeColumns(db, table);
    const client = await db.getClient();
    const cursor = client.query(new Cursor<TextRow>(this.selectSql(table, columns)));

    try {
      let rows: TextRow[];
      do {
        rows = await cursor.read(chunkSize);
        if (rows.length > 0) {
          yield rows.map(row => this.formatInsert(table, columns, row));
        }
      } while (rows.length > 0);
    } finally {
      await cursor.close();
      client.release();
    }
  }

  async describeColumns(db: IDbConnection, table: TableRef): Promise<ExtractedColumn[]> {
    return db.query<ExtractedColumn>(
      `SELECT a.attname AS name, a.attidentity::text AS identity
       FROM pg_attribute a
       WHERE a.attrelid = $1::regclass AND a.attnum > 0 AND NOT a.attisdropped AND a.attgenerated = ''
       ORDER BY a.attnum`,
      [qualify(table.schema, table.name)]
    );
  }

  selectSql(table: TableRef, columns: readonly ExtractedColumn[]): string {
    const list = columns.map(c => `${quoteIdent(c.name)}::text AS ${quoteIdent(c.name)}`).join(', ');
    return `SELECT ${list} FROM ${qualify(table.schema, table.name)}`;
  }

  formatInsert(table: TableRef, columns: readonly ExtractedColumn[], row: TextRow): string {
    const target = qualify(table.schema, table.name);
    if (columns.length === 0) return `INSERT INTO ${target} DEFAULT VALUES;`;

    const names = columns.map(c => quoteIdent(c.name)).join(', ');
    const values = columns.map(c => this.formatValue(row[c.name])).join(', ');
    // GENERATED ALWAYS identity columns refuse explicit values otherwise
    const overriding = columns.some(c => c.identity === 'a') ? ' OVERRIDING SYSTEM VALUE' : '';

    return `INSERT INTO ${target} (${names})${overriding} VALUES (${values});`;
  }

  formatValue(value: string | null | undefined): string {
    return value === null || value === undefined ? 'NULL' : quoteLiteral(value);
  }
}
