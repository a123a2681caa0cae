import fs from "node:fs";
import path from "node:path";

// Keep settings lookups inside the workspace so tests never read the
// host's ~/.blockpaint directory.
const testHome = path.resolve(process.cwd(), ".tmp", "blockpaint-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.BLOCKPAINT_HOME = testHome;
