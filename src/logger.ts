import { addBreadcrumb, SeverityLevel } from '@sentry/node';
import Table from 'cli-table';
import consola, {
  BasicReporter,
  Consola,
  ConsolaReporterLogObject,
  LogLevel,
} from 'consola';

type LineWriter = (line: string, logObj: ConsolaReporterLogObject) => void;

/** Hands each formatted log line to a writer */
class LineReporter extends BasicReporter {
  public constructor(private readonly writeLine: LineWriter) {
    super();
  }

  public log(logObj: ConsolaReporterLogObject): void {
    this.writeLine(this.formatLogObj(logObj), logObj);
  }
}

// stdout only carries what `--print` and the `changelog` command output
consola.setReporters([
  new LineReporter(line => process.stderr.write(`${line}\n`)),
]);

const BREADCRUMB_LEVELS: Record<string, SeverityLevel> = {
  fatal: 'fatal',
  error: 'error',
  warn: 'warning',
  debug: 'debug',
  trace: 'debug',
  verbose: 'debug',
};

// Log lines become breadcrumbs of a reported error
const breadcrumbReporter = new LineReporter((message, { type }) =>
  addBreadcrumb({
    category: 'log',
    message,
    level: BREADCRUMB_LEVELS[type] ?? 'info',
  })
);

/**
 * Renders rows as a text table
 *
 * @param head Column titles
 * @param rows One cell per column
 */
export function formatTable(head: string[], rows: string[][]): string {
  const table = new Table({ head });
  table.push(...rows);
  return table.toString();
}

export { LogLevel };

const scopes = new Set<Consola>();

function scopedLogger(tag?: string): Consola {
  const scoped = consola.withDefaults({ tag });
  scoped.addReporter(breadcrumbReporter);
  scoped.withScope = scopedLogger;
  scopes.add(scoped);
  return scoped;
}

export const logger = scopedLogger();
// Held back until `--log-level` is known, then flushed by setLevel
logger.pauseLogs();

/**
 * Applies the log level to every logger and flushes what was held back
 */
export function setLevel(logLevel: LogLevel): void {
  consola.level = logLevel;
  for (const scoped of scopes) {
    scoped.level = logLevel;
    scoped.resumeLogs();
  }
}
