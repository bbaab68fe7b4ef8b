import { LogLevel, ServerConfig, UnitType } from '@homelab/shared';

const ENUMERABLE_TYPES = UnitType.exclude(['other']);

function parseUnitTypes(raw: string): ServerConfig['unitTypes'] {
  const types = raw
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t.length > 0)
    .map((t) => {
      const parsed = ENUMERABLE_TYPES.safeParse(t);
      if (!parsed.success) {
        throw new Error(
          `HOMELAB_UNIT_TYPES contains unsupported type "${t}". Use any of: ${ENUMERABLE_TYPES.options.join(', ')}.`,
        );
      }
      return parsed.data;
    });

  const [first, ...rest] = types;
  if (first === undefined) {
    throw new Error('HOMELAB_UNIT_TYPES must name at least one unit type.');
  }
  return [first, ...new Set(rest.filter((t) => t !== first))];
}

export function loadConfig(): ServerConfig {
  const port = Number(process.env.PORT);
  if (process.env.PORT && (!Number.isInteger(port) || port < 1 || port > 65535)) {
    throw new Error('PORT must be an integer between 1 and 65535.');
  }

  const timeout = Number(process.env.HOMELAB_SYSTEMCTL_TIMEOUT_MS);
  if (process.env.HOMELAB_SYSTEMCTL_TIMEOUT_MS && (!Number.isInteger(timeout) || timeout < 1)) {
    throw new Error('HOMELAB_SYSTEMCTL_TIMEOUT_MS must be a positive integer.');
  }

  let logLevel: LogLevel | undefined;
  if (process.env.LOG_LEVEL) {
    const parsed = LogLevel.safeParse(process.env.LOG_LEVEL);
    if (!parsed.success) {
      throw new Error(
        `Invalid LOG_LEVEL: "${process.env.LOG_LEVEL}". Must be one of: ${LogLevel.options.join(', ')}.`,
      );
    }
    logLevel = parsed.data;
  }

  return ServerConfig.parse({
    port: process.env.PORT ? port : undefined,
    host: process.env.HOST || undefined,
    rulesPath: process.env.HOMELAB_RULES_PATH || undefined,
    unitTypes:
      process.env.HOMELAB_UNIT_TYPES !== undefined
        ? parseUnitTypes(process.env.HOMELAB_UNIT_TYPES)
        : undefined,
    systemctlTimeoutMs: process.env.HOMELAB_SYSTEMCTL_TIMEOUT_MS ? timeout : undefined,
    logLevel,
  });
}
