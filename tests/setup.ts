import { logger } from "../src/core/logger.js";

// Keep test output readable
logger.setHandlers([]);
