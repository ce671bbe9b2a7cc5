import dotenv from 'dotenv';
import { createApp } from './app';
import { configManager, loadEnvironmentConfig } from './config/config';

// Load environment variables
dotenv.config();

const envConfig = loadEnvironmentConfig();

// The environment only seeds the default configuration; PUT /api/config can
// change it afterwards.
const defaultConfig = configManager.getDefaultConfig();
if (
  defaultConfig.dispatchPolicy !== envConfig.dispatchPolicy ||
  defaultConfig.logEvents !== envConfig.logEvents
) {
  configManager.saveConfig({
    ...defaultConfig,
    dispatchPolicy: envConfig.dispatchPolicy,
    logEvents: envConfig.logEvents
  });
}

const app = createApp(envConfig);

// =============================================================================
// START SERVER
// =============================================================================

const PORT = envConfig.port;

app.listen(PORT, () => {
  console.log(`
╔═══════════════════════════════════════════════════════════════╗
║                   RIDE DISPATCH SIMULATOR                     ║
╠═══════════════════════════════════════════════════════════════╣
║  Status:      Running                                         ║
║  Port:        ${PORT.toString().padEnd(47)}║
║  Environment: ${envConfig.nodeEnv.padEnd(47)}║
║  Dispatch:    ${envConfig.dispatchPolicy.padEnd(47)}║
║  API Base:    http://localhost:${PORT}/api${' '.repeat(27)}║
╚═══════════════════════════════════════════════════════════════╝
  `);
});

export default app;
