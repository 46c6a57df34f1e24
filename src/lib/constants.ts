import path from "node:path";

export const ROOT_DIR = process.cwd();
export const CONFIG_PATH = path.resolve(ROOT_DIR, "config.yml");
export const TEMPLATES_DIR = path.resolve(ROOT_DIR, "templates");
export const TEMPLATE_PATH = path.resolve(TEMPLATES_DIR, "briefing.html");
export const OUTPUT_DIR = path.resolve(ROOT_DIR, "output");
export const LOG_DIR = path.resolve(ROOT_DIR, "logs");

export const USER_AGENT = "Mozilla/5.0 (compatible; MorningBriefing/1.0)";
