import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

/** Read-only view of connection counters handed to callers. */
export interface ConnectionStatsView {
	readonly connects: number;
	readonly disconnects: number;
	readonly proactiveDisconnects: number;
	readonly reactiveDisconnects: number;
	readonly reconnectAttempts: number;
	readonly messagesReceived: number;
	readonly bytesReceived: number;
	readonly messagesSent: number;
	readonly bytesSent: number;
	/** Clock time of the last successful connect; 0 when never connected. */
	readonly lastConnectAt: number;
	readonly lastDisconnectAt: number;
	/** Clock time of the last message in either direction. */
	readonly lastMessageAt: number;
	/** Time since these stats were created or last reset. */
	readonly uptimeMs: number;
	/** Time since the last connect; 0 when never connected. */
	readonly connectionTimeMs: number;
}

/**
 * Counters for one manager. Mutated only by the manager; callers see the
 * ConnectionStatsView interface.
 */
export class ConnectionStats implements ConnectionStatsView {
	connects = 0;
	disconnects = 0;
	proactiveDisconnects = 0;
	reactiveDisconnects = 0;
	reconnectAttempts = 0;
	messagesReceived = 0;
	bytesReceived = 0;
	messagesSent = 0;
	bytesSent = 0;
	lastConnectAt = 0;
	lastDisconnectAt = 0;
	lastMessageAt = 0;
	private readonly clock: Clock;
	private createdAt: number;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.createdAt = clock.now();
	}

	get uptimeMs(): number {
		return this.clock.now() - this.createdAt;
	}

	get connectionTimeMs(): number {
		return this.lastConnectAt === 0 ? 0 : this.clock.now() - this.lastConnectAt;
	}

	recordConnect(): void {
		this.connects += 1;
		this.lastConnectAt = this.clock.now();
	}

	recordDisconnect(proactive: boolean): void {
		this.disconnects += 1;
		if (proactive) {
			this.proactiveDisconnects += 1;
		} else {
			this.reactiveDisconnects += 1;
		}
		this.lastDisconnectAt = this.clock.now();
	}

	recordReconnectAttempt(): void {
		this.reconnectAttempts += 1;
	}

	recordMessageReceived(bytes: number): void {
		this.messagesReceived += 1;
		this.bytesReceived += bytes;
		this.lastMessageAt = this.clock.now();
	}

	recordMessageSent(bytes: number): void {
		this.messagesSent += 1;
		this.bytesSent += bytes;
		this.lastMessageAt = this.clock.now();
	}

	reset(): void {
		this.connects = 0;
		this.disconnects = 0;
		this.proactiveDisconnects = 0;
		this.reactiveDisconnects = 0;
		this.reconnectAttempts = 0;
		this.messagesReceived = 0;
		this.bytesReceived = 0;
		this.messagesSent = 0;
		this.bytesSent = 0;
		this.lastConnectAt = 0;
		this.lastDisconnectAt = 0;
		this.lastMessageAt = 0;
		this.createdAt = this.clock.now();
	}

	toJSON(): Record<string, number> {
		return {
			connects: this.connects,
			disconnects: this.disconnects,
			proactiveDisconnects: this.proactiveDisconnects,
			reactiveDisconnects: this.reactiveDisconnects,
			reconnectAttempts: this.reconnectAttempts,
			messagesReceived: this.messagesReceived,
			bytesReceived: this.bytesReceived,
			messagesSent: this.messagesSent,
			bytesSent: this.bytesSent,
			lastConnectAt: this.lastConnectAt,
			lastDisconnectAt: this.lastDisconnectAt,
			lastMessageAt: this.lastMessageAt,
			uptimeMs: this.uptimeMs,
			connectionTimeMs: this.connectionTimeMs,
		};
	}
}
