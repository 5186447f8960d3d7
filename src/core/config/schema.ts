import { z } from 'zod';
import { LOG_LEVEL_NAMES } from '../../utils/logger.js';

export const LogLevelSchema = z.enum(LOG_LEVEL_NAMES);

/** Contents of `.fixture/config.yaml`. */
export const ConfigSchema = z.object({
  log_level: LogLevelSchema.default('warn'),
});

export type Config = z.infer<typeof ConfigSchema>;
