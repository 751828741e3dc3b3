// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

/**
 * Destination for formatted log lines. Defaults to the console method
 * matching the level.
 */
export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[subcheck]" or "[match]").
    */
   prefix?: string;
   /**
    * Override where lines go (tests, embedding in other tools).
    */
   sink?: LogSink;
   /**
    * Force colors on or off. Defaults to TTY detection + NO_COLOR.
    */
   color?: boolean;
}

const supportsColor =
   typeof process !== 'undefined' &&
   Boolean(process.stdout?.isTTY) &&
   process.env.NO_COLOR === undefined;

type ColorFn = (text: string) => string;

function wrap(code: number, enabled: boolean): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (enabled ? `${open}${text}${close}` : text);
}

function palette(enabled: boolean) {
   return {
      red: wrap(31, enabled),
      yellow: wrap(33, enabled),
      cyan: wrap(36, enabled),
      magenta: wrap(35, enabled),
      dim: wrap(2, enabled),
   };
}

type Palette = ReturnType<typeof palette>;

function colorForLevel(colors: Palette, level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return colors.red;
      case 'warn':
         return colors.yellow;
      case 'info':
         return colors.cyan;
      case 'debug':
         return colors.dim;
      default:
         return (s) => s;
   }
}

const consoleSink: LogSink = (level, line) => {
   switch (level) {
      case 'error':
         console.error(line);
         break;
      case 'warn':
         console.warn(line);
         break;
      case 'debug':
         console.debug(line);
         break;
      default:
         console.log(line);
   }
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
   return LOG_LEVELS.find((level) => level === value);
}

/**
 * Leveled logger with colored output.
 *
 * Child loggers share their parent's level, so `setLevel` on the
 * process-wide logger (done by the CLI for --quiet / --debug) reaches
 * every module that derived a child from it.
 */
export class Logger {
   private readonly state: { level: LogLevel };
   private readonly prefix: string | undefined;
   private readonly sink: LogSink;
   private readonly colors: Palette;
   private readonly colorEnabled: boolean;

   constructor(options: LoggerOptions = {}, state?: { level: LogLevel }) {
      this.state = state ?? { level: options.level ?? 'info' };
      this.prefix = options.prefix;
      this.sink = options.sink ?? consoleSink;
      this.colorEnabled = options.color ?? supportsColor;
      this.colors = palette(this.colorEnabled);
   }

   setLevel(level: LogLevel) {
      this.state.level = level;
   }

   getLevel(): LogLevel {
      return this.state.level;
   }

   /**
    * Create a child logger with an additional prefix.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger(
         { prefix: combined, sink: this.sink, color: this.colorEnabled },
         this.state,
      );
   }

   private formatMessage(msg: unknown, rest: unknown[], lvl: LogLevel): string {
      const parts = [msg, ...rest].map((part) =>
         typeof part === 'string'
            ? part
            : part instanceof Error
               ? part.message
               : String(part),
      );
      const text = parts.join(' ');

      const textColored =
         lvl === 'debug'
            ? this.colors.dim(text)
            : colorForLevel(this.colors, lvl)(text);

      if (this.prefix) {
         return `${this.colors.magenta(this.prefix)} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.state.level === 'silent') return false;
      const currentIdx = LOG_LEVELS.indexOf(this.state.level);
      const targetIdx = LOG_LEVELS.indexOf(targetLevel);
      return targetIdx <= currentIdx;
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      this.sink('error', this.formatMessage(msg, rest, 'error'));
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      this.sink('warn', this.formatMessage(msg, rest, 'warn'));
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      this.sink('info', this.formatMessage(msg, rest, 'info'));
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      this.sink('debug', this.formatMessage(msg, rest, 'debug'));
   }
}

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via SUBCHECK_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: parseLogLevel(process.env.SUBCHECK_LOG_LEVEL) ?? 'info',
   prefix: '[subcheck]',
});
