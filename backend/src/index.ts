import { createApp } from './app';
import { loadConfig } from './config';
import { DatasetStore } from './dataset/datasetStore';
import { logger } from './logger';

const config = loadConfig();
logger.level = config.LOG_LEVEL;

const store = new DatasetStore(config.DATA_DIR);
const app = createApp({ store, config });

app.listen(config.PORT, () => {
  logger.info(`Backend listening on port ${config.PORT}`);
});
