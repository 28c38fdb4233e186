/**
 * EventChannel broadcast semantics
 */

import { describe, it, expect } from 'vitest';
import { EventChannel } from '../../src/utils/event-channel.js';
import { collect } from '../helpers/index.js';

describe('EventChannel', () => {
    it('should deliver every value to every subscriber in order', () => {
        const channel = new EventChannel<number>('numbers');
        const first = collect(channel);
        const second = collect(channel);

        channel.publish(1);
        channel.publish(2);

        expect(first.values).toEqual([1, 2]);
        expect(second.values).toEqual([1, 2]);
    });

    it('should not replay values to late subscribers', () => {
        const channel = new EventChannel<string>('strings');
        channel.publish('early');

        const late = collect(channel);
        channel.publish('late');

        expect(late.values).toEqual(['late']);
    });

    it('should stop delivering after unsubscribe and tolerate a second call', () => {
        const channel = new EventChannel<number>('numbers');
        const subscriber = collect(channel);

        channel.publish(1);
        subscriber.stop();
        subscriber.stop();
        channel.publish(2);

        expect(subscriber.values).toEqual([1]);
        expect(channel.listenerCount).toBe(0);
    });

    it('should keep delivering when one listener throws', () => {
        const channel = new EventChannel<number>('numbers');
        channel.subscribe(() => {
            throw new Error('listener failure');
        });
        const healthy = collect(channel);

        channel.publish(7);

        expect(healthy.values).toEqual([7]);
    });

    it('should drop listeners and ignore publishes once closed', () => {
        const channel = new EventChannel<number>('numbers');
        const subscriber = collect(channel);

        channel.close();
        channel.publish(1);
        const late = collect(channel);
        channel.publish(2);

        expect(channel.isClosed).toBe(true);
        expect(subscriber.values).toEqual([]);
        expect(late.values).toEqual([]);
        expect(channel.listenerCount).toBe(0);
    });
});
