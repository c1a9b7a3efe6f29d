import { DataMode } from '../types/index.js';
import { Classification, ClassifiedOutput } from '../types/plan.js';

export interface ClassificationRule {
  pattern: RegExp;
  classification: Extract<Classification, 'fatal' | 'tolerable'>;
  /** Restricts the rule to the listed data modes. */
  modes?: readonly DataMode[];
}

/** Evaluated in order; the first matching rule decides a line. */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  { pattern: /FATAL:/, classification: 'fatal' },
  { pattern: /could not connect/i, classification: 'fatal' },
  { pattern: /could not translate host name/i, classification: 'fatal' },
  { pattern: /authentication failed/i, classification: 'fatal' },
  { pattern: /connection to server .* failed/i, classification: 'fatal' },
  { pattern: /SSL connection has been closed/i, classification: 'fatal' },
  { pattern: /server closed the connection/i, classification: 'fatal' },
  { pattern: /timeout expired/i, classification: 'fatal' },
  { pattern: /^Terminated\b/, classification: 'fatal' },
  { pattern: /already exists/i, classification: 'tolerable' },
  { pattern: /does not exist/i, classification: 'tolerable' },
  { pattern: /errors ignored on restore/i, classification: 'tolerable' },
  { pattern: /permission denied to set role/i, classification: 'tolerable' },
  { pattern: /must be owner of/i, classification: 'tolerable' },
  {
    pattern: /duplicate key value violates unique constraint/i,
    classification: 'tolerable',
    modes: ['incremental'],
  },
];

const ERROR_LINE = /\b(ERROR|error):/;

/**
 * Table-driven classification of client-tool output. The exit code alone is
 * not trusted: a restore can exit non-zero on objects that already exist.
 */
export class OutputClassifier {
  constructor(private rules: readonly ClassificationRule[] = DEFAULT_RULES) {}

  classify(output: string, exitCode: number, mode: DataMode): ClassifiedOutput {
    const lines = output
      .split(/\r?\n/)
      .map(l => l.trim())
      .filter(Boolean);

    // a lost connection outranks any statement error printed before it
    const fatal = lines.find(line => this.match(line, mode)?.classification === 'fatal');
    if (fatal) return { classification: 'fatal', matched: [fatal] };

    const tolerated: string[] = [];
    for (const line of lines) {
      if (this.match(line, mode)?.classification === 'tolerable') {
        tolerated.push(line);
      } else if (ERROR_LINE.test(line)) {
        return { classification: 'unexpected', matched: [line] };
      }
    }

    if (tolerated.length > 0) return { classification: 'tolerable', matched: tolerated };
    if (exitCode !== 0) {
      return { classification: 'unexpected', matched: [lines[lines.length - 1] ?? `exited with code ${exitCode}`] };
    }
    return { classification: 'ok', matched: [] };
  }

  private match(line: string, mode: DataMode): ClassificationRule | undefined {
    return this.rules.find(r => r.pattern.test(line) && (!r.modes || r.modes.includes(mode)));
  }
}
