export { createTempStoreRoot, removeDir, withTempStore, withTempDir } from "./fs.js";
export { fixedClock, steppingClock, sleep } from "./timers.js";
