/**
 * Level-triggered flag that callers can wait on with a timeout.
 * Waiting on a set signal resolves immediately.
 */
export class Signal {
	private flag: boolean;
	private waiters: Array<() => void> = [];

	constructor(initiallySet = false) {
		this.flag = initiallySet;
	}

	get isSet(): boolean {
		return this.flag;
	}

	set(): void {
		if (this.flag) return;
		this.flag = true;
		for (const wake of this.waiters.splice(0)) wake();
	}

	clear(): void {
		this.flag = false;
	}

	/** True once the signal is set, false when `timeoutMs` elapses first. Never rejects. */
	wait(timeoutMs: number): Promise<boolean> {
		if (this.flag) return Promise.resolve(true);
		return new Promise<boolean>((resolve) => {
			const wake = (): void => {
				clearTimeout(timer);
				resolve(true);
			};
			const timer = setTimeout(() => {
				this.waiters = this.waiters.filter((w) => w !== wake);
				resolve(false);
			}, Math.max(0, timeoutMs));
			this.waiters.push(wake);
		});
	}
}
