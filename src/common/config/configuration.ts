export default () => ({
  app: {
    nodeEnv: process.env.NODE_ENV || 'development',
  },
  auth: {
    sessionDuration: process.env.SESSION_DURATION || '8h',
  },
  redis: {
    url: process.env.REDIS_URL,
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'sts:',
  },
  logging: {
    level: process.env.LOG_LEVEL || 'log',
  },
});
