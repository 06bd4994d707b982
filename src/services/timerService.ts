/**
 * Cancellable one-shot timers used for verification deadlines.
 *
 * @module services/timerService
 */

export interface TimerHandle {
	/** Best effort: a timer already firing may still run its callback. */
	cancel(): void;
}

export interface TimerService {
	schedule(delayMs: number, callback: () => void): TimerHandle;
}

export class NodeTimerService implements TimerService {
	schedule(delayMs: number, callback: () => void): TimerHandle {
		const timeout = setTimeout(callback, delayMs);
		return {
			cancel: () => clearTimeout(timeout),
		};
	}
}
