export interface Counters {
    received: number;
    stored: number;
    duplicates_ignored: number;
    rejected_auth: number;
    rejected_invalid: number;
    devices_registered: number;
    publish_failed: number;
}

function emptyCounters(): Counters {
    return {
        received: 0,
        stored: 0,
        duplicates_ignored: 0,
        rejected_auth: 0,
        rejected_invalid: 0,
        devices_registered: 0,
        publish_failed: 0,
    };
}

export class Metrics {
    private counters = emptyCounters();

    incrementReceived(): void {
        this.counters.received++;
    }

    incrementStored(): void {
        this.counters.stored++;
    }

    incrementDuplicatesIgnored(): void {
        this.counters.duplicates_ignored++;
    }

    incrementRejectedAuth(): void {
        this.counters.rejected_auth++;
    }

    incrementRejectedInvalid(): void {
        this.counters.rejected_invalid++;
    }

    incrementDevicesRegistered(): void {
        this.counters.devices_registered++;
    }

    incrementPublishFailed(): void {
        this.counters.publish_failed++;
    }

    getCounters(): Counters {
        return { ...this.counters };
    }

    reset(): void {
        this.counters = emptyCounters();
    }
}
