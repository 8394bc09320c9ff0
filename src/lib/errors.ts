export type ErrorCode = "CONFIG_ERROR" | "LOGFILE_ERROR" | "NOT_IMPLEMENTED" | "BACKEND_ERROR" | "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly exitCode: number;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; exitCode: number; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.exitCode = params.exitCode;
		this.details = params.details;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			exitCode: 1,
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		exitCode: 1,
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		exitCode: 2,
		message,
		details
	});
}

export function logfileError(logfile: string, cause: unknown): AppError {
	return new AppError({
		code: "LOGFILE_ERROR",
		exitCode: 1,
		message: `Could not open logfile ${logfile}: ${errorMessage(cause)}`,
		cause
	});
}

export function notImplemented(message: string): AppError {
	return new AppError({
		code: "NOT_IMPLEMENTED",
		exitCode: 1,
		message
	});
}

export function backendError(message: string, cause?: unknown): AppError {
	return new AppError({
		code: "BACKEND_ERROR",
		exitCode: 1,
		message,
		cause
	});
}
