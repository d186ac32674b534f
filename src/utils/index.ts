//
//
//

export { releaseTemporary, removeTemporaries, trackTemporary } from "./cleanup";
export { parseBoolean, parseNonNegativeInteger, readVariable } from "./env";
export { LOG_LEVELS, createRunLogger } from "./logger";
