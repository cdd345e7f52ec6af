import * as Joi from 'joi';
import { parseDuration } from '../utils/duration';

const sessionDuration = (value: string, helpers: Joi.CustomHelpers) => {
  try {
    parseDuration(value);
    return value;
  } catch {
    return helpers.error('any.invalid');
  }
};

export const configValidationSchema = Joi.object({
  // Application
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),

  // Sessions
  SESSION_DURATION: Joi.string()
    .custom(sessionDuration, 'session duration')
    .default('8h'),

  // Redis (optional; in-memory stores are used when unset)
  REDIS_URL: Joi.string().uri({ scheme: ['redis', 'rediss'] }).optional(),
  REDIS_KEY_PREFIX: Joi.string().default('sts:'),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('error', 'warn', 'log', 'debug', 'verbose')
    .default('log'),
});
