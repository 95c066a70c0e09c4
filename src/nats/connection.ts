import { connect, NatsConnection, ConnectionOptions } from 'nats';
import { logger } from '../config/logger.js';

/**
 * Where committed-vital events go. {@link NatsClient} is the production
 * transport.
 */
export interface EventTransport {
    publish(subject: string, data: string, msgId: string): Promise<void>;
    isConnected(): boolean;
}

export class NatsClient implements EventTransport {
    private nc: NatsConnection | null = null;
    private connecting = false;

    constructor(
        private options: ConnectionOptions,
        private streamName: string,
    ) { }

    async connect(): Promise<void> {
        if (this.nc || this.connecting) {
            return;
        }

        this.connecting = true;

        try {
            logger.info({ servers: this.options.servers }, 'Connecting to NATS');

            this.nc = await connect(this.options);

            logger.info('Connected to NATS successfully');

            this.watchStatus(this.nc).catch((err) => {
                logger.warn({ error: err }, 'NATS status stream ended');
            });
        } catch (err) {
            logger.error({ error: err }, 'Failed to connect to NATS');
            throw err;
        } finally {
            this.connecting = false;
        }
    }

    private async watchStatus(nc: NatsConnection): Promise<void> {
        for await (const status of nc.status()) {
            logger.info({ type: status.type, data: status.data }, 'NATS status update');
        }
    }

    getConnection(): NatsConnection {
        if (!this.nc) {
            throw new Error('NATS connection not established');
        }
        return this.nc;
    }

    /**
     * JetStream publish into the configured stream. `msgId` lets the server
     * drop a re-sent event.
     */
    async publish(subject: string, data: string, msgId: string): Promise<void> {
        const js = this.getConnection().jetstream();
        await js.publish(subject, data, {
            msgID: msgId,
            expect: { streamName: this.streamName },
        });
    }

    isConnected(): boolean {
        return this.nc !== null && !this.nc.isClosed();
    }

    async close(): Promise<void> {
        if (this.nc) {
            logger.info('Closing NATS connection');
            await this.nc.drain();
            this.nc = null;
        }
    }
}
