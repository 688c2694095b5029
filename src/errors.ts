import type { GroupKey } from './types/data';

export type PipelineErrorCode = 'INPUT_SHAPE' | 'CONFIG' | 'ZERO_SALES';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Missing column, unparseable date or number, unreadable CSV. Raised before any feature is computed. */
export class InputShapeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INPUT_SHAPE', message, options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class ZeroSalesError extends PipelineError {
  readonly groups: readonly GroupKey[];

  constructor(groups: readonly GroupKey[]) {
    const list = groups
      .map(g => `(product ${g.product_id}, store ${g.store_id}, brand ${g.brand_id})`)
      .join(', ');
    super('ZERO_SALES', `WMAPE undefined for ${groups.length} group(s) with zero total sales: ${list}`);
    this.groups = groups;
  }
}
