/**
 * Runtime validation for configuration values and option objects.
 *
 * Small fluent builders; no schema library needed for the handful of
 * shapes Setu reads from config files.
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${typeof value}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

class BooleanValidator {
	validate: ValidatorFn<boolean> = (value: unknown) => {
		if (typeof value !== "boolean") {
			return { valid: false, error: `Expected boolean, received ${typeof value}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${value === null ? "null" : typeof value}` };
		}
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(Reflect.get(value, key));
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else {
				result[key] = fieldResult.value;
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const optionsV = v.object({
 *   maxFramePayload: v.number().integer().min(1).validate,
 *   rejectWithHttpError: v.optional(v.boolean().validate).validate,
 * }).validate;
 * ```
 */
export const v = {
	number: () => new NumberValidator(),
	boolean: () => new BooleanValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value, collecting the failure into a {@link ValidationResult}
 * instead of throwing.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>, path = "$"): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{
			path,
			message: result.error ?? "Validation failed",
			received: value,
		}],
	};
}
