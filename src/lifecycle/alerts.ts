import type { ConnectionHooks, DisconnectReason } from "../websocket/types.js";
import { isProactive } from "../websocket/types.js";
import { AlertLevel } from "./types.js";
import type { AlertSink } from "./types.js";

export interface ConnectionAlertOptions {
	/** Stream name used in alert titles. Default "websocket". */
	readonly name?: string | undefined;
	/** Also report planned disconnects, at info level. */
	readonly reportProactive?: boolean | undefined;
}

export type ConnectionAlertHooks = {
	readonly [K in "onConnect" | "onDisconnect" | "onAlert"]-?: NonNullable<ConnectionHooks[K]>;
};

/**
 * Connection hooks that turn manager lifecycle events into alerts.
 *
 * Reactive disconnects raise a warning; the next successful connect after one
 * raises an info-level recovery. `onAlert` from the manager (reconnects
 * exhausted) is forwarded as critical.
 */
export function connectionAlertHooks(
	sink: AlertSink,
	options: ConnectionAlertOptions = {},
): ConnectionAlertHooks {
	const name = options.name ?? "websocket";
	let pendingRecovery: DisconnectReason | null = null;

	return {
		onConnect: async () => {
			if (pendingRecovery === null) return;
			const after = pendingRecovery;
			pendingRecovery = null;
			await sink.send({
				level: AlertLevel.Info,
				channel: "websocket",
				title: `${name} recovered`,
				message: `${name} reconnected after ${after}`,
				context: { after },
			});
		},
		onDisconnect: async (reason) => {
			if (isProactive(reason)) {
				if (options.reportProactive !== true) return;
				await sink.send({
					level: AlertLevel.Info,
					channel: "websocket",
					title: `${name} disconnected`,
					message: `${name} disconnected: ${reason}`,
					context: { reason },
				});
				return;
			}
			pendingRecovery = reason;
			await sink.send({
				level: AlertLevel.Warning,
				channel: "websocket",
				title: `${name} disconnected`,
				message: `${name} disconnected: ${reason}`,
				context: { reason },
			});
		},
		onAlert: async (channel, message, context) => {
			await sink.send({
				level: AlertLevel.Critical,
				channel,
				title: `${name} alert`,
				message,
				context,
			});
		},
	};
}
