import { z } from 'zod';
import {
  DEFAULT_SERVER_PORT,
  DEFAULT_SYSTEMCTL_TIMEOUT_MS,
  LogLevel,
  UnitType,
} from './common.js';

export const ServerConfig = z.object({
  /** Port the HTTP server listens on */
  port: z.number().int().min(1).max(65535).default(DEFAULT_SERVER_PORT),
  /** Hostname to bind to */
  host: z.string().min(1).default('0.0.0.0'),
  /** Rule file replacing the bundled defaults */
  rulesPath: z.string().min(1).optional(),
  /** Unit types passed to `systemctl list-units --type=` */
  unitTypes: z
    .array(UnitType.exclude(['other']))
    .nonempty()
    .default(['service']),
  /** Ceiling on one systemctl call */
  systemctlTimeoutMs: z.number().int().positive().default(DEFAULT_SYSTEMCTL_TIMEOUT_MS),
  logLevel: LogLevel.default('info'),
});
export type ServerConfig = z.infer<typeof ServerConfig>;
