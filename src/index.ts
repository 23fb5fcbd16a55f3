import dotenv from 'dotenv';
import { createApp } from './app';
import { loadEnvironmentConfig } from './config/config';
import { createDispatchEngine } from './services/DispatchEngine';
import { GoogleMapsService, MockGeocodingService } from './utils/geocoding';
import { Logger } from './utils/logger';

// Load environment variables
dotenv.config();

const envConfig = loadEnvironmentConfig();
const logger = new Logger(envConfig.logLevel, 'server');

// =============================================================================
// SERVICE SETUP
// Real Google geocoding when a key is configured, otherwise the offline mock.
// =============================================================================

const geocoder = envConfig.googleMapsApiKey
  ? new GoogleMapsService(envConfig.googleMapsApiKey)
  : new MockGeocodingService();

const engine = createDispatchEngine({
  config: envConfig.dispatch,
  geocoder,
  logger
});

const app = createApp({ engine, env: envConfig, logger });

// =============================================================================
// START SERVER
// =============================================================================

const PORT = envConfig.port;

const server = app.listen(PORT, () => {
  logger.info('Repair dispatch service running', {
    port: PORT,
    environment: envConfig.nodeEnv,
    apiBase: `http://localhost:${PORT}/api`,
    defaultSearchRadiusKm: envConfig.dispatch.defaultSearchRadiusKm,
    maxSearchRadiusKm: envConfig.dispatch.maxSearchRadiusKm
  });

  if (!envConfig.googleMapsApiKey) {
    logger.warn('GOOGLE_MAPS_API_KEY not set. Using mock geocoding service.');
  }
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  engine.stop();
  server.close(err => {
    if (err) {
      logger.error('Error while closing server', err);
      process.exitCode = 1;
    }
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export default app;
