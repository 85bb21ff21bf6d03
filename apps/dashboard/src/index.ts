import { createLanguageModel } from '@townsquare/career-ideas';
import { NominatimGeocoder, NullGeocoder, type Geocoder } from '@townsquare/community-map';
import { readDashboardConfig, type DashboardConfig } from './config.js';
import { createDashboardLogger } from './logger.js';
import { createDashboardApp, startDashboardServer, type DashboardServerHandle } from './server.js';
import { SessionRegistry } from './sessions.js';

function createGeocoder(config: DashboardConfig['geocoder']): Geocoder {
  if (!config.enabled) {
    return new NullGeocoder();
  }

  return new NominatimGeocoder({ baseUrl: config.baseUrl, userAgent: config.userAgent });
}

let server: DashboardServerHandle | null = null;

async function run(): Promise<void> {
  const config = readDashboardConfig();
  const logger = createDashboardLogger(config.logging);
  const model = createLanguageModel(config.languageModel);

  if (!model.configured) {
    logger.warn(
      { event: 'language_model_unconfigured' },
      'OPENAI_API_KEY not set; career idea generation is disabled',
    );
  }

  const app = createDashboardApp({
    logger,
    geocoder: createGeocoder(config.geocoder),
    model,
    sessions: new SessionRegistry({ idleMs: config.sessionIdleMs }),
  });

  server = startDashboardServer({
    host: config.host,
    port: config.port,
    maxBodyBytes: config.maxBodyBytes,
    logger,
    app,
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');

    await server?.close();

    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

run().catch(async (error) => {
  await server?.close();
  const logger = createDashboardLogger(readDashboardConfig().logging);
  logger.error({ event: 'dashboard_fatal_error', error }, 'Dashboard fatal error');
  process.exit(1);
});
