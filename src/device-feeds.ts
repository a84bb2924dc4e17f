import { z } from 'zod';
import { AsyncChannel } from './channel.js';
import { moduleLogger } from './logger.js';
import { LocationSample, NetworkTypeSample } from './types.js';

const log = moduleLogger('device-feeds');

export const LocationSampleSchema = z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    horizontalAccuracy: z.number(),
    timestamp: z.number().int().nonnegative()
});

export const NetworkTypeSampleSchema = z.object({
    type: z.enum(['wifi', 'cellular']),
    timestamp: z.number().int().nonnegative()
});

export const RadioTechnologySchema = z.object({
    technology: z.string().min(1).nullable()
});

/**
 * Receives what the connected device reports and fans it out to the
 * subscribers of the active run.
 */
export class DeviceFeeds {
    private locationSubscribers: Set<AsyncChannel<LocationSample>> = new Set();
    private networkSubscribers: Set<AsyncChannel<NetworkTypeSample>> = new Set();
    private technology?: string;
    private lastNetworkType?: NetworkTypeSample;

    public get radioTechnology(): string | undefined {
        return this.technology;
    }

    public get networkType(): NetworkTypeSample | undefined {
        return this.lastNetworkType;
    }

    public pushLocation(sample: LocationSample) {
        for (const channel of this.locationSubscribers) {
            channel.push(sample);
        }
    }

    public pushNetworkType(sample: NetworkTypeSample) {
        this.lastNetworkType = sample;
        for (const channel of this.networkSubscribers) {
            channel.push(sample);
        }
    }

    public setRadioTechnology(technology: string | undefined) {
        if (technology !== this.technology) {
            log.debug({ technology }, 'Radio technology changed');
        }
        this.technology = technology;
    }

    public locations(signal: AbortSignal): AsyncIterable<LocationSample> {
        return this.subscribe(this.locationSubscribers, signal);
    }

    // New subscribers first get the last known network type
    public networkTypes(signal: AbortSignal): AsyncIterable<NetworkTypeSample> {
        const channel = this.subscribe(this.networkSubscribers, signal);
        if (this.lastNetworkType) channel.push(this.lastNetworkType);
        return channel;
    }

    private subscribe<T>(subscribers: Set<AsyncChannel<T>>, signal: AbortSignal): AsyncChannel<T> {
        const channel = new AsyncChannel<T>();
        if (signal.aborted) {
            channel.close();
            return channel;
        }

        subscribers.add(channel);
        signal.addEventListener('abort', () => {
            subscribers.delete(channel);
            channel.close();
        }, { once: true });
        return channel;
    }
}
