import { getConfig } from './config.js';
import { createApp } from './app.js';

const config = getConfig();
const app = createApp();

app.listen(config.port, () => {
  console.log(`[phonediag] Backend running on http://localhost:${config.port}`);
  console.log(`[phonediag] Logs dir: ${config.logsDir}`);
  console.log(`[phonediag] Upload dir: ${config.uploadDir}`);
});
