/**
 * Error types raised or returned by the dashboard core.
 *
 * Only structural problems (a malformed entity table, an unreadable
 * aesthetics document, an invalid configuration) are thrown. Recoverable
 * conditions travel as values: `InvalidQueryError` inside a `QueryResult`,
 * missing capabilities inside an `Availability`.
 */

export type DashboardErrorCode =
  | 'INVALID_QUERY'
  | 'UNKNOWN_ATTRIBUTE'
  | 'DATA_STRUCTURE'
  | 'AESTHETICS_FORMAT'
  | 'CONFIG';

export class DashboardError extends Error {
  readonly code: DashboardErrorCode;

  constructor(code: DashboardErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed or unsafe filter expression. `position` is the character offset
 * where parsing stopped, when known.
 */
export class InvalidQueryError extends DashboardError {
  readonly expression: string;
  readonly position: number | null;

  constructor(expression: string, message: string, position: number | null = null) {
    super('INVALID_QUERY', message);
    this.expression = expression;
    this.position = position;
  }
}

export class UnknownAttributeError extends DashboardError {
  readonly attribute: string;
  readonly fallback: string | null;

  constructor(attribute: string, fallback: string | null) {
    super(
      'UNKNOWN_ATTRIBUTE',
      fallback === null
        ? `Unknown attribute "${attribute}"`
        : `Unknown attribute "${attribute}", using "${fallback}"`
    );
    this.attribute = attribute;
    this.fallback = fallback;
  }
}

/** The entity table cannot be used; the session refuses to start. */
export class DataStructureError extends DashboardError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('DATA_STRUCTURE', `Invalid entity table: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export class AestheticsFormatError extends DashboardError {
  constructor(message: string) {
    super('AESTHETICS_FORMAT', message);
  }
}

export class ConfigError extends DashboardError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `Invalid dashboard configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
