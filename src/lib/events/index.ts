import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { stateChange: (from: ConnectionState, to: ConnectionState) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/** Receives exceptions thrown by listeners so one bad subscriber cannot break the emitter. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

interface Registration {
	readonly handler: unknown;
	readonly wrapped: (...args: unknown[]) => void;
}

/**
 * Type-safe event emitter over eventemitter3.
 *
 * Listener exceptions are caught and passed to `onListenerError` (rethrown
 * when none is given), so `emit()` from inside a state transition never
 * unwinds the caller halfway through.
 *
 * @example
 * ```ts
 * type Events = { message: (data: unknown) => void };
 * const emitter = new TypedEmitter<Events>((event, e) => log.error({ event, e }, "listener failed"));
 * emitter.on("message", (data) => console.log(data));
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly registrations = new Map<string, Registration[]>();
	private readonly onListenerError: ListenerErrorHandler | undefined;

	constructor(onListenerError?: ListenerErrorHandler) {
		this.onListenerError = onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, this.register(event, handler, false));
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		const list = this.registrations.get(event);
		const index = list?.findIndex((r) => r.handler === handler) ?? -1;
		const registration = list?.[index];
		if (list && registration) {
			list.splice(index, 1);
			this.ee.off(event, registration.wrapped);
		}
		return this;
	}

	/** Registers a handler that auto-removes after its first invocation. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, this.register(event, handler, true));
		return this;
	}

	/** Invokes every listener for `event`; returns false when there were none. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
			this.registrations.delete(event);
		} else {
			this.ee.removeAllListeners();
			this.registrations.clear();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	private register<K extends keyof TEvents & string>(
		event: K,
		handler: TEvents[K],
		once: boolean,
	): (...args: unknown[]) => void {
		const wrapped = (...args: unknown[]): void => {
			if (once) this.forget(event, wrapped);
			try {
				handler(...args);
			} catch (error) {
				if (!this.onListenerError) throw error;
				this.onListenerError(event, error);
			}
		};
		const list = this.registrations.get(event) ?? [];
		list.push({ handler, wrapped });
		this.registrations.set(event, list);
		return wrapped;
	}

	private forget(event: string, wrapped: (...args: unknown[]) => void): void {
		const list = this.registrations.get(event);
		if (!list) return;
		const index = list.findIndex((r) => r.wrapped === wrapped);
		if (index !== -1) list.splice(index, 1);
	}
}
