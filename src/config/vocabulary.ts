import { readFileSync, existsSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { StatusVocabularySchema } from "./schema.js";
import { VOCABULARY_FILE } from "../constants.js";
import type { StatusVocabulary } from "../types.js";

function getProjectRoot(): string {
  // src/config/ and dist/config/ both sit two levels below the package root
  const thisDir = dirname(fileURLToPath(import.meta.url));
  return join(thisDir, "..", "..");
}

export function defaultVocabularyPath(): string {
  return join(getProjectRoot(), "config", VOCABULARY_FILE);
}

/**
 * Load the status indicator vocabulary. The portal's wording changes without
 * notice, so the tokens live in a JSON table rather than in code.
 */
export function loadVocabulary(path = defaultVocabularyPath()): StatusVocabulary {
  if (!existsSync(path)) {
    throw new Error(`Status vocabulary not found at ${path}`);
  }
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return StatusVocabularySchema.parse(raw);
}
