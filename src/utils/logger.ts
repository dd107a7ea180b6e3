/**
 * パイプライン共通のロガー
 * コンソール出力に加え、ログファイルが設定されていれば同じ行を追記する
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private level: LogLevel;
  private filePath?: string;

  constructor(level: string | undefined = process.env.LOG_LEVEL) {
    this.level = isLogLevel(level) ? level : 'info';
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // 以降のログを指定ファイルにも追記する
  attachFile(filePath: string): void {
    mkdirSync(dirname(filePath), { recursive: true });
    this.filePath = filePath;
  }

  detachFile(): void {
    this.filePath = undefined;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;

    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }

    if (this.filePath) {
      try {
        appendFileSync(this.filePath, line + '\n', 'utf-8');
      } catch (error) {
        // ファイルに書けなくてもコンソール出力は継続する
        this.filePath = undefined;
        console.error(`ログファイルへの書き込みに失敗しました: ${String(error)}`);
      }
    }
  }
}

export const logger = new Logger();
