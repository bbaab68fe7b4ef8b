import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { DiscoveryRules } from '@homelab/shared';
import { RulesValidationError } from './errors.js';

/** Rule tables bundled with the package */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../rules/default-rules.json', import.meta.url),
);

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/** Validates raw rule tables and returns a deep-frozen copy */
export function parseDiscoveryRules(input: unknown, source = 'rules'): DiscoveryRules {
  const result = DiscoveryRules.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new RulesValidationError(`Invalid discovery rules in ${source}`, issues);
  }
  return deepFreeze(result.data);
}

/**
 * Reads a JSON rule file once. Called at start-up; the returned tables are
 * immutable for the life of the process.
 */
export function loadDiscoveryRules(filePath: string = DEFAULT_RULES_PATH): DiscoveryRules {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new RulesValidationError(`Cannot read rule file ${filePath}: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new RulesValidationError(`Rule file ${filePath} is not valid JSON: ${message}`);
  }

  return parseDiscoveryRules(json, filePath);
}
