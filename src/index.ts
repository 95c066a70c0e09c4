import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { openDatabase } from './store/database.js';
import { CredentialStore } from './auth/credential-store.js';
import { DeviceRegistry } from './devices/registry.js';
import { DeviceRegistrationService } from './devices/registration.js';
import { IdempotencyLedger } from './ingest/idempotency-ledger.js';
import { IngestionPipeline } from './ingest/pipeline.js';
import { VitalsQueries } from './vitals/queries.js';
import { NatsClient } from './nats/connection.js';
import { VitalsPublisher } from './nats/publisher.js';
import { Metrics } from './metrics/counter.js';
import { ApiServer } from './api/server.js';

async function main() {
    logger.info('Starting vital-signs ingestion service');

    // Load configuration
    const config = loadConfig();
    logger.info(
        {
            database: config.database.path,
            http: config.http,
            nats: config.nats,
        },
        'Configuration loaded',
    );

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();
    if (!validator.isReady()) {
        throw new Error(`No contracts loaded from ${config.contracts.path}`);
    }

    const db = openDatabase(config.database.path);
    const metrics = new Metrics();

    const credentials = new CredentialStore(db, config.auth.masterKey);
    const registry = new DeviceRegistry(db);
    const ledger = new IdempotencyLedger(db);

    // Optional vitals.recorded events
    let natsClient: NatsClient | undefined;
    if (config.nats.enabled) {
        natsClient = new NatsClient(
            { servers: config.nats.url, name: 'vitals-ingest' },
            config.nats.stream,
        );
        await natsClient.connect();
    }

    const pipeline = new IngestionPipeline(
        db,
        credentials,
        validator,
        ledger,
        metrics,
        natsClient ? new VitalsPublisher(natsClient, validator) : undefined,
    );

    const apiServer = new ApiServer(
        config.http.port,
        {
            db,
            credentials,
            registration: new DeviceRegistrationService(credentials, validator, registry, metrics),
            pipeline,
            queries: new VitalsQueries(db),
            metrics,
            events: natsClient,
        },
        config.http.corsOrigins,
    );

    await apiServer.start();

    logger.info('Vital-signs ingestion service running');

    // Graceful shutdown
    const shutdown = async () => {
        logger.info('Shutting down gracefully');

        await apiServer.stop();
        await natsClient?.close();
        db.close();

        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err) => {
            logger.error({ error: err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error during startup');
    process.exit(1);
});
