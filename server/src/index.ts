import { createApp } from './app';
import { loadConfig, MISSING_API_KEY_MESSAGE } from './config';
import { errorLog, infoLog, setLogLevel, warnLog } from './utils/logger';

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.googleApiKey) {
    warnLog(MISSING_API_KEY_MESSAGE);
  }

  const app = createApp({ config });
  const server = app.listen(config.port, () => {
    infoLog(`Server running at http://localhost:${config.port}`);
    infoLog('Environment:', config.nodeEnv);
    infoLog('Gemini model:', config.geminiModel);
    infoLog('CORS origins:', config.corsOrigins.join(', '));
  });
  server.on('error', (error) => {
    errorLog('Server error:', error);
    process.exitCode = 1;
  });
}

try {
  main();
} catch (error) {
  errorLog('Failed to start the server:', error);
  process.exitCode = 1;
}
