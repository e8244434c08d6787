export interface ErrorContext {
  dataset?: string;
  rowIndex?: number;
  key?: string;
  family?: string;
  value?: unknown;
  [extra: string]: unknown;
}

function describeContext(context: ErrorContext): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(context)) {
    if (value === undefined) continue;
    parts.push(`${name}=${JSON.stringify(value)}`);
  }
  return parts.length ? ` (${parts.join(', ')})` : '';
}

export class EtlError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}) {
    super(`${message}${describeContext(context)}`);
    this.name = new.target.name;
    this.context = context;
  }
}

/** The mapping table does not match the dataset version being processed. */
export class ConfigurationError extends EtlError {}

/** A closed categorical family received a value none of its synonyms cover. */
export class UnknownCategoryError extends EtlError {
  readonly family: string;
  readonly rawValue: string;

  constructor(family: string, rawValue: string, context: ErrorContext = {}) {
    super(`Unknown ${family.replace(/_/g, ' ')}: ${JSON.stringify(rawValue)}`, {
      ...context,
      family
    });
    this.family = family;
    this.rawValue = rawValue;
  }
}

export class MalformedValueError extends EtlError {
  readonly rawValue: unknown;

  constructor(expected: string, rawValue: unknown, context: ErrorContext = {}) {
    super(`Expected ${expected}, got ${JSON.stringify(rawValue)}`, { ...context, value: rawValue });
    this.rawValue = rawValue;
  }
}

export class OutputValidationError extends EtlError {}
