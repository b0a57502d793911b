import type {StyleProperty} from './style.js';

export function loggableText(text: string): string {
  return text.replace(/\n/g, '⏎').replace(/\t/g, '␉');
}

export interface TreeLogOptions {
  containingBlocks?: boolean;
  css?: StyleProperty;
  paragraphText?: string;
}

export interface LoggerOptions {
  /** receives the buffered text on flush(), console.log by default */
  write?: (text: string) => void;
  /** false leaves out the ANSI escapes */
  color?: boolean;
}

export class Logger {
  string: string;
  indent: string[];
  lineIsEmpty: boolean;
  write: (text: string) => void;
  color: boolean;

  constructor(options: LoggerOptions = {}) {
    this.string = '';
    this.indent = [];
    this.lineIsEmpty = false;
    this.write = options.write ?? (text => console.log(text));
    this.color = options.color ?? true;
  }

  private escape(code: number) {
    if (this.color) this.string += `\x1b[${code}m`;
  }

  bold() {
    this.escape(1);
  }

  underline() {
    this.escape(4);
  }

  dim() {
    this.escape(2);
  }

  reset() {
    this.escape(0);
  }

  flush() {
    this.write(this.string);
    this.string = '';
  }

  text(str: string | number) {
    const lines = String(str).split('\n');

    const append = (s: string) => {
      if (s) {
        if (this.lineIsEmpty) this.string += this.indent.join('');
        this.string += s;
        this.lineIsEmpty = false;
      }
    };

    for (let i = 0; i < lines.length; i++) {
      if (i === 0) {
        append(lines[i]);
      } else {
        this.string += '\n';
        this.lineIsEmpty = true;
        append(lines[i]);
      }
    }
  }

  pushIndent(indent = '  ') {
    this.indent.push(indent);
  }

  popIndent() {
    this.indent.pop();
  }
}
