import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CONFIG_PATH = join(__dirname, "..", "config", "default.json");

// Template files copied into every workspace
export const DEFAULT_TEMPLATES_DIR = join(__dirname, "..", "defaults");
