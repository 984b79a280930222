import { Verbosity } from '../types';

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export class ConsoleLogger implements Logger {
  private verbosity: Verbosity;

  constructor(verbosity: Verbosity = 'verbose') {
    this.verbosity = verbosity;
  }

  setVerbosity(verbosity: Verbosity): void {
    this.verbosity = verbosity;
  }

  log(message: string): void {
    if (this.verbosity === 'quiet') return;
    console.log(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }

  debug(message: string): void {
    if (this.verbosity !== 'debug') return;
    console.debug(message);
  }
}

export const defaultLogger = new ConsoleLogger();
