import dotenv from 'dotenv';
import { createApp } from './app';
import { configManager, loadEnvironmentConfig } from './config/config';
import { createSeededStore } from './store/partnerStore';

// Load environment variables
dotenv.config();

const envConfig = loadEnvironmentConfig();

async function main(): Promise<void> {
  const store = await createSeededStore(envConfig.seedDataPath);
  const app = createApp({ store, configManager, env: envConfig });

  if (!configManager.hasConfig(envConfig.matchConfigId)) {
    console.warn(`[Server] Config "${envConfig.matchConfigId}" not found, using the default configuration.`);
  }

  const PORT = envConfig.port;

  app.listen(PORT, () => {
    console.log(`[Server] Climbing Partner Matcher listening on port ${PORT}`);
    console.log(`[Server] Environment: ${envConfig.nodeEnv}`);
    console.log(`[Server] API Base: http://localhost:${PORT}/api`);
  });
}

main().catch(error => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
