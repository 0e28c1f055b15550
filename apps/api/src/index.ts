import './utils/env';
import { createApp } from './app';
import { getConfig } from './config';
import { getLogger } from './utils/logger';

const logger = getLogger('Api');
const { port } = getConfig();

createApp().listen(port, () => {
  logger.info(`EHR Insights API running on ${port}`);
});
