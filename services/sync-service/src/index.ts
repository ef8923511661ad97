import { createEsClient, EsIndex, EsIndexClient } from '@indexsync/search-index';
import { createService, logger, startService } from '@indexsync/service-template';
import { loadEnvConfig } from './config';
import { createConnectors } from './connectors';
import { createSyncHandlers } from './handlers/syncHandlers';
import { JobRegistry } from './registry/jobRegistry';
import { SourceRegistry } from './registry/sourceRegistry';
import { createRouter } from './routes';

const config = loadEnvConfig();
const esClient = createEsClient(config.elasticsearch);

const handlers = createSyncHandlers({
    client: new EsIndexClient(esClient),
    connectors: createConnectors(),
    jobs: new JobRegistry(),
    sources: new SourceRegistry(),
    settings: config.sync,
    documents: index => new EsIndex(esClient, index)
});

const app = createService('sync-service');
app.use(createRouter(handlers));

startService(app, config.port);
logger.info('Sync service configured', { elasticsearch: config.elasticsearch.node, sync: config.sync });
