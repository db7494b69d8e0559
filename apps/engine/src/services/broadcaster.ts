import type { Redis } from 'ioredis';
import type { Broadcaster } from '../workflow/ports';

const TAG = '[broadcaster]';

export const DEFAULT_EVENTS_CHANNEL = 'parley:events';

export interface BroadcastEnvelope {
    event: string;
    payload: unknown;
    published_at: string;
}

// Publishes engine events over Redis pub/sub. Delivery is best effort:
// a failed publish is logged and the dialog carries on.
export class RedisBroadcaster implements Broadcaster {
    constructor(
        private readonly redis: Pick<Redis, 'publish'>,
        private readonly channel: string = DEFAULT_EVENTS_CHANNEL,
    ) { }

    publish(event: string, payload: unknown): void {
        const envelope: BroadcastEnvelope = { event, payload, published_at: new Date().toISOString() };

        let message: string;
        try {
            message = JSON.stringify(envelope);
        } catch (err) {
            console.error(`${TAG} could not encode ${event}:`, err);
            return;
        }

        this.redis.publish(this.channel, message).catch((err: unknown) => {
            console.error(`${TAG} failed to publish ${event}:`, err);
        });
    }
}
