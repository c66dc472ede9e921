/**
 * Error taxonomy of the rendering engine.
 *
 * Recoverable conditions (a missing layout, a failed image fetch) are never
 * thrown; they surface as render metadata and log warnings.
 */

export type DeckErrorCode =
  | 'SCHEMA_VALIDATION'
  | 'TEMPLATE_CATALOG'
  | 'CHART_DATA_MISMATCH'
  | 'TABLE_GRID_MISMATCH'
  | 'DOCUMENT_ASSEMBLY'
  | 'RENDER_CANCELLED'
  | 'ENGINE_CONFIGURATION';

/**
 * Base class for all engine errors.
 */
export class DeckError extends Error {
  public readonly code: DeckErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: DeckErrorCode, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DeckError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Malformed deck input, rejected before any rendering work.
 */
export class SchemaValidationError extends DeckError {
  public readonly reason: string;
  /** Offending slide, absent for deck-level faults */
  public readonly slideIndex?: number;

  constructor(reason: string, slideIndex?: number) {
    const where = slideIndex !== undefined ? ` (slide ${slideIndex})` : '';
    super(`Invalid slide deck${where}: ${reason}`, 'SCHEMA_VALIDATION', { reason, slideIndex });
    this.name = 'SchemaValidationError';
    this.reason = reason;
    this.slideIndex = slideIndex;
  }
}

/**
 * The template cannot serve any request.
 */
export class TemplateCatalogError extends DeckError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, 'TEMPLATE_CATALOG', details, options);
    this.name = 'TemplateCatalogError';
  }
}

/**
 * Chart series length disagrees with the category count at bind time.
 */
export class ChartDataMismatchError extends DeckError {
  constructor(slideIndex: number, seriesName: string, expected: number, actual: number) {
    super(
      `Chart series "${seriesName}" has ${actual} values for ${expected} categories`,
      'CHART_DATA_MISMATCH',
      { slideIndex, seriesName, expected, actual }
    );
    this.name = 'ChartDataMismatchError';
  }
}

/**
 * Table data does not match a template table with a fixed grid.
 */
export class TableGridMismatchError extends DeckError {
  constructor(slideIndex: number, expected: { rows: number; columns: number }, actual: { rows: number; columns: number }) {
    super(
      `Table is ${actual.rows}x${actual.columns} but the template grid is ${expected.rows}x${expected.columns}`,
      'TABLE_GRID_MISMATCH',
      { slideIndex, expected, actual }
    );
    this.name = 'TableGridMismatchError';
  }
}

/**
 * Serialization-level fault while writing the package.
 */
export class DocumentAssemblyError extends DeckError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, 'DOCUMENT_ASSEMBLY', details, options);
    this.name = 'DocumentAssemblyError';
  }
}

/**
 * The caller aborted the render.
 */
export class RenderCancelledError extends DeckError {
  constructor(stage: string) {
    super(`Render cancelled during ${stage}`, 'RENDER_CANCELLED', { stage });
    this.name = 'RenderCancelledError';
  }
}

/**
 * Invalid engine options or unusable startup resources other than the template.
 */
export class EngineConfigurationError extends DeckError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, 'ENGINE_CONFIGURATION', details, options);
    this.name = 'EngineConfigurationError';
  }
}

/**
 * Extracts a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
