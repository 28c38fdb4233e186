/**
 * Host lifecycle signal sources
 */

import _ from 'lodash';
import { LifecycleSignal } from '../types/runtime.js';
import { EventChannel, type Listener } from '../utils/event-channel.js';
import { logger } from '../utils/logger.js';

export interface LifecycleSource {
    subscribe(listener: Listener<LifecycleSignal>): () => void
}

/**
 * Push-based lifecycle source: the host calls `emit` when its application moves
 * between foreground and background.
 */
export class LifecycleSignalHub implements LifecycleSource {
    private readonly channel = new EventChannel<LifecycleSignal>('lifecycle');

    subscribe(listener: Listener<LifecycleSignal>): () => void {
        return this.channel.subscribe(listener);
    }

    emit(signal: LifecycleSignal): void {
        logger.debug({ signal }, 'Lifecycle signal received');
        this.channel.publish(signal);
    }

    close(): void {
        this.channel.close();
    }
}

// Job-control signals stand in for application lifecycle events
const PROCESS_SIGNAL_MAP: readonly (readonly [NodeJS.Signals, LifecycleSignal])[] = [
    ['SIGCONT', LifecycleSignal.RESUMED],
    ['SIGTSTP', LifecycleSignal.PAUSED],
    ['SIGHUP', LifecycleSignal.DETACHED],
];

/**
 * Forward process signals to a hub. Returns a function that removes the handlers.
 */
export function bindProcessSignals(hub: LifecycleSignalHub, target: NodeJS.EventEmitter = process): () => void {
    const bindings = _.map(PROCESS_SIGNAL_MAP, ([processSignal, lifecycleSignal]) => {
        const handler = (): void => {
            hub.emit(lifecycleSignal);
        };
        target.on(processSignal, handler);
        return { processSignal, handler };
    });

    return _.once(() => {
        for(const { processSignal, handler } of bindings) {
            target.off(processSignal, handler);
        }
    });
}
