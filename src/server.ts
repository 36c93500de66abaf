import { createApp } from './app';
import { config, validateConfig } from './config';
import { closeOnSignals, createRedisClient } from './config/redis';
import { MemoryStorage } from './repositories/memory.storage';
import { RedisStorage } from './repositories/redis.storage';
import { Storage } from './repositories/storage';
import { EventApp } from './services/dispatch/event-app';
import { message } from './types/response.types';
import { createLogger, setLogLevel } from './utils/logger';

const logger = createLogger('server');

function buildEventApp(storage: Storage): EventApp {
  const oauthEnabled = Boolean(config.oauth.clientId && config.oauth.clientSecret);

  const eventApp = new EventApp({
    appName: config.install.appName || undefined,
    baseUrl: config.baseUrl,
    storage,
    encryptionKey: config.encryptionKey || undefined,
    oauth: oauthEnabled
      ? {
          clientId: config.oauth.clientId,
          clientSecret: config.oauth.clientSecret,
          redirectUri: config.oauth.redirectUri || undefined,
          scopes: config.oauth.scopes,
          imsUrl: config.oauth.imsUrl,
          tokenRefreshBufferSeconds: config.oauth.tokenRefreshBufferSeconds,
        }
      : undefined,
    install: config.install.appName
      ? {
          appName: config.install.appName,
          appDescription: config.install.appDescription,
          sessionSecret: config.install.sessionSecret,
          sessionTtl: config.install.sessionTtl,
          apiBaseUrl: config.frameio.apiBaseUrl,
          secureCookie: config.nodeEnv === 'production',
          branding: {
            logoUrl: config.install.logoUrl || undefined,
            primaryColor: config.install.primaryColor || undefined,
            accentColor: config.install.accentColor || undefined,
            showPoweredBy: config.install.showPoweredBy,
          },
        }
      : undefined,
  });

  // Example handlers
  eventApp.onWebhook(['file.ready', 'file.upload.completed'], async (event) => {
    logger.info(`File ${event.resourceId} ready in project ${event.projectId}`);
  });

  eventApp.onAction(
    'frameio_event_kit.hello',
    async (event) => message('Hello!', `Received ${event.resources.length} resource(s).`),
    { name: 'Say Hello', description: 'Replies with a greeting', resourceType: ['file', 'folder'] }
  );

  return eventApp;
}

async function startServer() {
  try {
    setLogLevel(config.logLevel);

    // Validate environment variables
    const configProblems = validateConfig();
    if (configProblems.length > 0) {
      configProblems.forEach((problem) => logger.error(`✗ ${problem}`));
      process.exit(1);
    }

    let storage: Storage;
    if (config.redisUrl) {
      const redis = createRedisClient(config.redisUrl);
      closeOnSignals(redis);
      storage = new RedisStorage(redis);
      await storage.ensureReady?.();
      logger.info('✓ Redis storage ready');
    } else {
      storage = new MemoryStorage();
      logger.warn('REDIS_URL not set; using in-memory storage (data is lost on restart)');
    }

    const eventApp = buildEventApp(storage);
    const appProblems = eventApp.validateConfiguration();
    if (appProblems.length > 0) {
      appProblems.forEach((problem) => logger.error(`✗ ${problem}`));
      process.exit(1);
    }

    const port = config.port;
    createApp(eventApp).listen(port, () => {
      logger.info(`🚀 Listening on port ${port} (${config.nodeEnv})`);
      logger.info(`Handlers: ${eventApp.registeredTypes.join(', ')}`);
      logger.info('Endpoints:');
      logger.info('  POST /');
      logger.info('  GET  /health');
      if (eventApp.oauthClient) logger.info('  GET  /auth/login, /auth/callback');
      if (eventApp.installationManager) logger.info('  GET  /install');
    });
  } catch (error) {
    logger.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
