/**
 * Lightweight typed event bus for sound playback notifications.
 * Consumers (debug overlays, gameplay hooks, tests) subscribe here instead of
 * reaching into the pool.
 */

import type { PlayFailureReason, SoundKey } from './audio/audio-definitions';
import { LogHandler } from '@/utilities/log-handler';

/** Event map defining all sound events and their payloads */
export interface SfxEvents {
    /** Emitted after a handle started playing a variant */
    'sfx:started': {
        handleId: number;
        sound: SoundKey;
        volume: number;
        pitch: number;
        /** Expected playback time in seconds (always >= 0) */
        duration: number;
    };
    /** Emitted after a handle went back to the pool */
    'sfx:finished': {
        handleId: number;
        sound: SoundKey;
        /** Retry waits needed because the voice was still playing past its expected end */
        extraWaits: number;
        /** True when playback was cut short by stop() */
        stopped: boolean;
    };
    /** Emitted when a play request could not be served */
    'sfx:rejected': {
        sound: SoundKey;
        reason: PlayFailureReason;
    };
    /** Emitted whenever the pool creates voices */
    'pool:grown': {
        size: number;
        added: number;
        /** 'startup' for the initial fill, 'exhausted' when a request found no idle voice */
        reason: 'startup' | 'exhausted';
    };
}

type EventHandler<T> = (payload: T) => void;

type HandlerSets = { [K in keyof SfxEvents]?: Set<EventHandler<SfxEvents[K]>> };

export class EventBus {
    private static log = new LogHandler('EventBus');

    private handlers: HandlerSets = {};

    /** Register an event handler */
    on<K extends keyof SfxEvents>(event: K, handler: EventHandler<SfxEvents[K]>): void {
        const existing = this.handlers[event];
        if (existing) {
            existing.add(handler);
            return;
        }
        const created = new Set<EventHandler<SfxEvents[K]>>([handler]);
        const handlers: { [P in K]?: Set<EventHandler<SfxEvents[P]>> } = this.handlers;
        handlers[event] = created;
    }

    /** Remove an event handler */
    off<K extends keyof SfxEvents>(event: K, handler: EventHandler<SfxEvents[K]>): void {
        this.handlers[event]?.delete(handler);
    }

    /**
     * Emit an event to all registered handlers. Emitters sit inside the
     * playback cycle, so a failing handler is logged and the rest still run.
     */
    emit<K extends keyof SfxEvents>(event: K, payload: SfxEvents[K]): void {
        const handlers = this.handlers[event];
        if (!handlers) return;
        for (const handler of handlers) {
            try {
                handler(payload);
            } catch (e) {
                const err = e instanceof Error ? e : new Error(String(e));
                EventBus.log.error(`Handler for "${event}" failed`, err);
            }
        }
    }

    /** Number of handlers registered for an event */
    listenerCount(event: keyof SfxEvents): number {
        return this.handlers[event]?.size ?? 0;
    }

    /** Remove all handlers */
    clear(): void {
        this.handlers = {};
    }
}

/**
 * Tracks subscriptions so they can be dropped all at once.
 *
 * @example
 * ```ts
 * const subscriptions = new EventSubscriptionManager();
 * subscriptions.subscribe(eventBus, 'sfx:finished', ({ sound }) => counts.add(sound));
 * // later
 * subscriptions.unsubscribeAll();
 * ```
 */
export class EventSubscriptionManager {
    private unsubscribers: Array<() => void> = [];

    /**
     * Subscribe to an event and track the subscription for later cleanup.
     */
    subscribe<K extends keyof SfxEvents>(
        eventBus: EventBus,
        event: K,
        handler: EventHandler<SfxEvents[K]>,
    ): void {
        eventBus.on(event, handler);
        this.unsubscribers.push(() => eventBus.off(event, handler));
    }

    /**
     * Unsubscribe from all tracked events.
     */
    unsubscribeAll(): void {
        for (const unsubscribe of this.unsubscribers) {
            unsubscribe();
        }
        this.unsubscribers = [];
    }

    /** Number of active subscriptions */
    get count(): number {
        return this.unsubscribers.length;
    }
}
