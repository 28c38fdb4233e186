/**
 * Broadcast event channels
 *
 * A channel delivers every published value to every current subscriber, in
 * publication order. Late subscribers see nothing that was published before they
 * subscribed. Owners keep the EventChannel and hand out the Subscribable view so
 * that only they can publish.
 */

import { EventEmitter } from 'node:events';
import _ from 'lodash';
import { logger } from './logger.js';

export type Listener<T> = (value: T) => void;

export interface Subscribable<T> {
    /** Returns a function that removes the listener; calling it twice is harmless */
    subscribe(listener: Listener<T>): () => void
}

const EVENT = 'value';

export class EventChannel<T> implements Subscribable<T> {
    private readonly emitter = new EventEmitter();
    private closed = false;

    constructor(private readonly name: string) {
        this.emitter.setMaxListeners(0);
    }

    subscribe(listener: Listener<T>): () => void {
        if(this.closed) {
            return _.noop;
        }

        const deliver = (value: T): void => {
            try {
                listener(value);
            } catch (error) {
                logger.error({ channel: this.name, error: _.isError(error) ? error.message : String(error) }, 'Event listener threw');
            }
        };

        this.emitter.on(EVENT, deliver);
        return _.once(() => {
            this.emitter.off(EVENT, deliver);
        });
    }

    publish(value: T): void {
        if(this.closed) {
            return;
        }
        this.emitter.emit(EVENT, value);
    }

    close(): void {
        this.closed = true;
        this.emitter.removeAllListeners();
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get listenerCount(): number {
        return this.emitter.listenerCount(EVENT);
    }
}
