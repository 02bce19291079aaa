// @setu/core: Foundation
export * from "./types.js";
export * from "./errors.js";
export {
	createConfig,
	cascadeConfigs,
	loadProjectConfig,
	deepSet,
	PROJECT_CONFIG_FILE,
} from "./config.js";

// Validation
export { v, validate } from "./validation.js";
export type { ValidatorFn, ValidationError, ValidationResult } from "./validation.js";

// Observability
export * from "./observability/index.js";
