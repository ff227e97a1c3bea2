export { ConflictError } from "./conflict-error.js";
export { ExternalError } from "./external-error.js";
export { NotFoundError } from "./not-found-error.js";
export { TimeoutError } from "./timeout-error.js";
export { ValidationError } from "./validation-error.js";
