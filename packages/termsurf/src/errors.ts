export type SurfaceErrorCode = "invalid-geometry" | "invalid-attachment" | "allocation-failure";

export class SurfaceError extends Error {
	readonly code: SurfaceErrorCode;

	constructor(code: SurfaceErrorCode, message: string) {
		super(message);
		this.name = "SurfaceError";
		this.code = code;
	}
}

/**
 * Outcome of a compositor operation. Failures are returned, never thrown,
 * and are never retried internally.
 */
export type SurfaceResult = { ok: true } | { ok: false; error: SurfaceError };

export const OK: SurfaceResult = { ok: true };

export function fail(code: SurfaceErrorCode, message: string): SurfaceResult {
	return { ok: false, error: new SurfaceError(code, message) };
}
