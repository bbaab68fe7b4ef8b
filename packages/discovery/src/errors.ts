/**
 * The service manager could not be queried at all: systemctl missing,
 * permission denied, timed out, or its output was unusable.
 */
export class DiscoveryUnavailable extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiscoveryUnavailable';
  }
}

/**
 * One unit's status fields were malformed or missing.
 * Raised and handled inside the enumerator; the unit is reported as unknown.
 */
export class UnitParseIncomplete extends Error {
  readonly unit: string;

  constructor(unit: string, message: string) {
    super(message);
    this.name = 'UnitParseIncomplete';
    this.unit = unit;
  }
}

export class RulesValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  ${issues.join('\n  ')}` : message);
    this.name = 'RulesValidationError';
    this.issues = issues;
  }
}
