// Errors
export * from "./errors.js";

// Publish-and-wait results
export * from "./result.js";

// Device wire format (subjects, framing, decoding)
export * from "./wire.js";

// Zod runtime schemas
export * from "./schemas.js";

// Color strings
export { parseColor } from "./color.js";
