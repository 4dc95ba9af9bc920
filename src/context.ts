/**
 * Mutable state of one compile pass.
 *
 * The active hook, the active regular expression capture and the feature
 * reference flag change as the descent enters nested directives. Scoped
 * setters restore the previous value when the nested work returns, so the
 * context is always correct for the node being compiled.
 */

import { Hook } from "./hook.ts";

export interface ActiveCapture {
	/** Groups available, including group 0. Zero if no expression is active. */
	readonly count: number;
	/** Line of the pattern that set the capture. */
	readonly line: number;
}

export const NO_CAPTURE: ActiveCapture = Object.freeze({ count: 0, line: 0 });

export class ParseContext {
	private activeHook: Hook;
	private capture: ActiveCapture = NO_CAPTURE;
	private featureRef = false;

	constructor(hook: Hook = Hook.INVALID) {
		this.activeHook = hook;
	}

	get hook(): Hook {
		return this.activeHook;
	}

	get activeCapture(): ActiveCapture {
		return this.capture;
	}

	/** Run `fn` with `hook` active. */
	withHook<T>(hook: Hook, fn: () => T): T {
		const saved = this.activeHook;
		this.activeHook = hook;
		try {
			return fn();
		} finally {
			this.activeHook = saved;
		}
	}

	/** Run `fn` with a regular expression of `count` groups active. */
	withCapture<T>(count: number, line: number, fn: () => T): T {
		const saved = this.capture;
		this.capture = { count, line };
		try {
			return fn();
		} finally {
			this.capture = saved;
		}
	}

	/**
	 * Run `fn` in a new feature scope and report whether any expression
	 * compiled inside it referenced the live transaction.
	 */
	featureScope<T>(fn: () => T): { value: T; ctxRef: boolean } {
		const saved = this.featureRef;
		this.featureRef = false;
		try {
			const value = fn();
			return { value, ctxRef: this.featureRef };
		} finally {
			this.featureRef = saved;
		}
	}

	/** Record a context reference in the innermost feature scope. */
	markCtxRef(): void {
		this.featureRef = true;
	}
}
