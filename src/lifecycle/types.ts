/**
 * Supervision types — what the heartbeat watches and how alerts leave the process.
 *
 * A supervisor never reaches into a connection manager: it polls `isDead`
 * and `isShutdown`, and decides on its own to build a replacement.
 */

// ── Health ───────────────────────────────────────────────────────────

export const HealthStatus = {
	/** Last beat within the warning window */
	Healthy: "healthy",
	/** Beats are late */
	Degraded: "degraded",
	/** Beats have stopped */
	Critical: "critical",
} as const;

export type HealthStatus = (typeof HealthStatus)[keyof typeof HealthStatus];

export interface HealthThresholds {
	readonly warningMs: number;
	readonly criticalMs: number;
}

// ── Supervised target ────────────────────────────────────────────────

/** Anything a heartbeat can supervise. WebSocketManager satisfies it. */
export interface SupervisedTarget {
	readonly isDead: boolean;
	/** A dead target that was shut down on purpose is not reported. */
	readonly isShutdown?: boolean | undefined;
}

// ── Alerts ───────────────────────────────────────────────────────────

export const AlertLevel = {
	Info: "info",
	Warning: "warning",
	Critical: "critical",
} as const;

export type AlertLevel = (typeof AlertLevel)[keyof typeof AlertLevel];

export interface Alert {
	readonly level: AlertLevel;
	/** Source of the alert, e.g. "websocket" or "heartbeat". */
	readonly channel: string;
	readonly title: string;
	readonly message: string;
	readonly context: Readonly<Record<string, unknown>>;
}

/** Delivery boundary: Slack, email or a pager live behind this. */
export interface AlertSink {
	send(alert: Alert): void | Promise<void>;
}

export type AlertHook = (
	channel: string,
	message: string,
	context: Record<string, unknown>,
) => void | Promise<void>;
