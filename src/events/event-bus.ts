/**
 * Event bus
 *
 * Publish/subscribe transport shared by the configuration manager, the
 * detector and whoever feeds samples in or acts on mitigation decisions.
 * Delivery is synchronous and in subscription order: an exception thrown by a
 * handler surfaces at the emit call.
 */

import { EventEmitter } from 'events';
import type { Logger } from '../logging/logger';
import { LogComponents } from '../logging/components';

export type EventHandler = (payload: unknown) => void;

export interface EventBus {
	emit(eventName: string, payload: unknown): void;
	/** Returns a function that removes the subscription */
	subscribe(eventName: string, handler: EventHandler): () => void;
}

export interface EventManagerOptions {
	logger?: Logger;
}

export class EventManager implements EventBus {
	private readonly emitter = new EventEmitter();
	private readonly logger?: Logger;

	constructor(options: EventManagerOptions = {}) {
		this.logger = options.logger;
	}

	emit(eventName: string, payload: unknown): void {
		this.logger?.debug(`Emitting event ${eventName}`, {
			component: LogComponents.EVENT_BUS,
			listeners: this.emitter.listenerCount(eventName),
		});
		this.emitter.emit(eventName, payload);
	}

	subscribe(eventName: string, handler: EventHandler): () => void {
		this.emitter.on(eventName, handler);
		this.logger?.debug(`Registered handler for event ${eventName}`, {
			component: LogComponents.EVENT_BUS,
		});

		return () => {
			this.emitter.off(eventName, handler);
		};
	}

	listenerCount(eventName: string): number {
		return this.emitter.listenerCount(eventName);
	}
}
