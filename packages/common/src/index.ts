// ============================================
// Common Package Entry
// ============================================

export * from "./types/chain.js";
export * from "./types/strategy.js";
export * from "./types/events.js";
export * from "./constants/chains.js";
export * from "./errors.js";
export * from "./utils/logger.js";
export * from "./utils/config.js";
export * from "./utils/math.js";
export * from "./utils/db.js";
export * from "./utils/redis.js";
