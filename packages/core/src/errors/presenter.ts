/**
 * ErrorPresenter - pure presentation layer for RunstatError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  RunstatError,
  SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  detail?: string;
  cause?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError;

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RunstatError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      detail: this.#formatDetail(error.context),
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForProduction(error: RunstatError): ProductionView {
    return error.toJSON('prod');
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.path) return `File: ${ctx.path}`;
    if (ctx.benchmark) return `Benchmark: ${ctx.benchmark}`;
    return undefined;
  }

  #formatDetail(ctx?: ErrorContext): string | undefined {
    if (!ctx?.key) return undefined;
    if ('expected' in ctx && ctx.expected !== undefined) {
      return `${ctx.key}: expected ${JSON.stringify(ctx.expected)}, got ${JSON.stringify(ctx.value)}`;
    }
    return `Metadata: ${ctx.key}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}
