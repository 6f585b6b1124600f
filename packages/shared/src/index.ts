/**
 * @testbridge/shared - Shared types, error taxonomy and constants
 */

// Export all types
export * from "./types/index.js";

// Export constants
export * from "./constants.js";
