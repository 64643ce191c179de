/**
 * Console logger for the file-organizer CLI
 *
 * Prefixes each line with a stage marker, honours --quiet/--verbose/--no-color,
 * and adds ISO timestamps for non-interactive output (CI, --no-color).
 */

export interface LoggerOptions {
  /** Only errors are printed */
  quiet: boolean;
  /** Debug lines are printed */
  verbose: boolean;
  noColor: boolean;
  timestamps: boolean;
}

export interface SpinnerController {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

type Color = keyof typeof COLORS;

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

const DEFAULT_OPTIONS: LoggerOptions = {
  quiet: false,
  verbose: false,
  noColor: false,
  timestamps: false,
};

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  getOptions(): LoggerOptions {
    return { ...this.options };
  }

  private paint(color: Color, text: string): string {
    if (this.options.noColor) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  private format(prefix: string, message: string): string {
    const line = `${prefix} ${message}`;
    return this.options.timestamps ? `[${new Date().toISOString()}] ${line}` : line;
  }

  private write(prefix: string, message: string): void {
    if (this.options.quiet) return;
    console.log(this.format(prefix, message));
  }

  /** Scanning the folder */
  discovery(message: string): void {
    this.write(this.paint('cyan', '🔍'), message);
  }

  /** Talking to the model */
  inference(message: string): void {
    this.write(this.paint('magenta', '🧠'), message);
  }

  /** Touching the filesystem */
  move(message: string): void {
    this.write(this.paint('blue', '📦'), message);
  }

  success(message: string): void {
    this.write(this.paint('green', '✓'), message);
  }

  warning(message: string): void {
    this.write(this.paint('yellow', '⚠'), message);
  }

  error(message: string): void {
    console.error(this.format(this.paint('red', '✗'), message));
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
    this.write(this.paint('dim', '→'), message);
  }

  section(title: string): void {
    if (this.options.quiet) return;
    console.log(this.paint('bold', `=== ${title} ===`));
  }

  info(label: string, value: string | number): void {
    if (this.options.quiet) return;
    console.log(`  ${this.paint('dim', `${label}:`)} ${value}`);
  }

  listItem(text: string, indent = 0): void {
    if (this.options.quiet) return;
    console.log(`${'  '.repeat(indent)}• ${text}`);
  }

  blank(): void {
    if (this.options.quiet) return;
    console.log('');
  }

  /**
   * Animated spinner on a TTY. Elsewhere (and in quiet or timestamp mode)
   * only the final succeed/fail line is printed.
   */
  spinner(text: string): SpinnerController {
    const animate = !this.options.quiet && !this.options.timestamps && process.stdout.isTTY === true;

    if (!animate) {
      return {
        update: () => {},
        succeed: (finalText?: string) => this.success(finalText ?? text),
        fail: (finalText?: string) => this.error(finalText ?? text),
        stop: () => {},
      };
    }

    let current = text;
    let frame = 0;
    const render = (): void => {
      process.stdout.write(`\r\x1b[K${this.paint('cyan', SPINNER_FRAMES[frame % SPINNER_FRAMES.length])} ${current}`);
      frame++;
    };
    render();
    const timer = setInterval(render, 80);
    timer.unref();

    const stop = (): void => {
      clearInterval(timer);
      process.stdout.write('\r\x1b[K');
    };

    return {
      update: (next: string) => {
        current = next;
      },
      succeed: (finalText?: string) => {
        stop();
        this.success(finalText ?? current);
      },
      fail: (finalText?: string) => {
        stop();
        this.error(finalText ?? current);
      },
      stop,
    };
  }
}

export const logger = new Logger();

/**
 * Apply CLI flags to the shared logger
 */
export function configureLogger(options: Partial<LoggerOptions>): void {
  logger.configure(options);
}

export default logger;
