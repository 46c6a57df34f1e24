#!/usr/bin/env tsx

/**
 * Checks config.yml and the briefing template without calling any API.
 *
 * Usage:
 *   npx tsx scripts/validate-config.ts [path/to/config.yml]
 */

import path from "node:path";
import { loadConfig } from "../src/lib/config";
import { CONFIG_PATH } from "../src/lib/constants";
import { describeError, MalformedTemplateError } from "../src/lib/errors";
import type { BriefingConfig } from "../src/lib/types";
import { loadTemplate } from "../src/render/assemble";
import { parseTemplate } from "../src/render/template";

interface ValidationError {
  file: string;
  field: string;
  message: string;
}

const errors: ValidationError[] = [];
const notes: string[] = [];

function addError(file: string, field: string, message: string): void {
  errors.push({ file, field, message });
}

async function validateConfig(configPath: string): Promise<BriefingConfig | null> {
  try {
    return await loadConfig(configPath);
  } catch (error) {
    addError(configPath, "file", describeError(error));
    return null;
  }
}

async function validateTemplate(templatePath: string): Promise<void> {
  try {
    const source = await loadTemplate(templatePath);
    const nodes = parseTemplate(source);
    notes.push(`Template parsed (${nodes.length} top-level nodes)`);
  } catch (error) {
    const field = error instanceof MalformedTemplateError ? `offset ${error.offset}` : "file";
    addError(templatePath, field, describeError(error));
  }
}

async function main(): Promise<void> {
  console.log("🔍 Validating configuration files...\n");

  const configPath = path.resolve(process.cwd(), process.argv[2] ?? CONFIG_PATH);
  const config = await validateConfig(configPath);
  if (config) {
    notes.push(`${config.news.feeds.length} feeds, up to ${config.news.max_articles} articles`);
    if (!config.calendar) {
      notes.push("No calendar configured; the events section will be empty");
    }
    if (!config.timezone) {
      notes.push("No timezone set; dates use the host time zone");
    }
    await validateTemplate(config.output.template);
  }

  if (errors.length === 0) {
    notes.forEach((note) => console.log(`  ${note}`));
    console.log("\n✅ All configuration files are valid!\n");
    process.exit(0);
  } else {
    console.error("❌ Validation errors found:\n");
    errors.forEach((error) => {
      console.error(`  ${error.file}`);
      console.error(`    Field: ${error.field}`);
      console.error(`    Error: ${error.message}\n`);
    });
    process.exit(1);
  }
}

void main();
