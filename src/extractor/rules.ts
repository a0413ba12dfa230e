/**
 * @fileoverview Static extraction rules: container selectors, tracking and
 * keep URL patterns, noise patterns and the tags pruned before rendering.
 *
 * Rules exist in two shapes:
 *
 *   - {@link RuleSource}: plain strings, as written below or in a JSON rules
 *     file (`RULES_FILE`).
 *   - {@link ExtractionRules}: the compiled, frozen form the pipeline takes.
 *     Regexes are compiled once here and shared read-only by every request.
 *
 * The built-in noise patterns are the promotional copy of Russian OFD
 * receipt pages. Deployments for other operators or locales replace them
 * through a rules file rather than code.
 *
 * @module extractor/rules
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * One entry of the ordered container list.
 *
 * When `encoded` is true the matched element's text content is HTML-escaped
 * markup: it is decoded and parsed as a document of its own.
 */
export interface ContainerRule {
  readonly selector: string;
  readonly encoded: boolean;
}

/** Uncompiled rules, as they appear in source or in a rules file. */
export interface RuleSource {
  containers: ContainerRule[];
  trackingUrlPatterns: string[];
  keepUrlPatterns: string[];
  noisePatterns: string[];
  unwantedTags: string[];
}

/** Compiled, immutable rules injected into the pipeline. */
export interface ExtractionRules {
  readonly containers: readonly ContainerRule[];
  /** Case-sensitive; a URL matching any of these is tracking. */
  readonly trackingUrlPatterns: readonly RegExp[];
  /** Case-sensitive; a URL matching any of these is never removed. */
  readonly keepUrlPatterns: readonly RegExp[];
  /** Global, case-insensitive; applied in order. */
  readonly noisePatterns: readonly RegExp[];
  readonly unwantedTags: readonly string[];
}

// ---------------------------------------------------------------------------
// Built-in Rules
// ---------------------------------------------------------------------------

/**
 * Built-in rules for OFD receipt pages.
 *
 * Container order is priority order: the first selector that matches wins.
 */
export const DEFAULT_RULE_SOURCE: RuleSource = {
  containers: [
    { selector: "#fido_cheque_container", encoded: true },
    { selector: ".check_ctn", encoded: false },
    { selector: ".js__cheque_fido_constructor", encoded: false },
  ],
  trackingUrlPatterns: [
    "urlstats\\.platformaofd\\.ru",
    "share\\.floctory\\.com",
    "cdn1\\.platformaofd\\.ru/checkmarketing",
    "cdn1\\.platformaofd\\.ru/fido-constructor",
    "page\\.link",
    "mc\\.yandex\\.ru",
    "jivosite\\.com",
    "besteml\\.com",
  ],
  keepUrlPatterns: [
    "/web/noauth/cheque/pdf",
    "nalog\\.gov\\.ru",
    "platformaofd\\.ru/web/noauth/cheque/search",
  ],
  noisePatterns: [
    "Вам подарки за проведенную оплату!?",
    "Вам доступен \\(\\d+\\) подарок за покупку!?",
    "Подарок за оплату\\s*",
    "Выбрать подарок\\s*",
    "Забрать\\s*",
    "Активировать\\s*",
    "Ваш подарок за покупку неактивен\\s*",
    // decorative image alt text
    "волна",
    "Картинка",
    "⭐️[^⭐]*⭐️",
  ],
  unwantedTags: [
    "script",
    "style",
    "meta",
    "link",
    "noscript",
    "iframe",
    "svg",
    "img",
  ],
};

// ---------------------------------------------------------------------------
// Compilation
// ---------------------------------------------------------------------------

function compilePattern(pattern: string, flags: string, list: string): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new ConfigError(
      `Invalid pattern in ${list}: ${pattern} (${errorMessage(error)})`,
    );
  }
}

/**
 * Compile a {@link RuleSource} into frozen {@link ExtractionRules}.
 *
 * @throws {ConfigError} If any pattern is not a valid regular expression.
 */
export function compileRules(source: RuleSource): ExtractionRules {
  return Object.freeze({
    containers: Object.freeze(
      source.containers.map((rule) =>
        Object.freeze({ selector: rule.selector, encoded: rule.encoded }),
      ),
    ),
    trackingUrlPatterns: Object.freeze(
      source.trackingUrlPatterns.map((p) =>
        compilePattern(p, "", "trackingUrlPatterns"),
      ),
    ),
    keepUrlPatterns: Object.freeze(
      source.keepUrlPatterns.map((p) => compilePattern(p, "", "keepUrlPatterns")),
    ),
    noisePatterns: Object.freeze(
      source.noisePatterns.map((p) => compilePattern(p, "gi", "noisePatterns")),
    ),
    unwantedTags: Object.freeze(
      source.unwantedTags.map((tag) => tag.trim().toLowerCase()),
    ),
  });
}

export const DEFAULT_RULES: ExtractionRules = compileRules(DEFAULT_RULE_SOURCE);

// ---------------------------------------------------------------------------
// Rules File
// ---------------------------------------------------------------------------

/**
 * Shape of a JSON rules file. Every key is optional; a present key replaces
 * the built-in list of the same name wholesale.
 *
 * @example
 * ```json
 * {
 *   "containers": [{ "selector": "#receipt", "encoded": false }],
 *   "noisePatterns": ["Special offer!?"]
 * }
 * ```
 */
export const RuleFileSchema = z
  .object({
    containers: z.array(
      z.object({
        selector: z.string().min(1),
        encoded: z.boolean().default(false),
      }),
    ),
    trackingUrlPatterns: z.array(z.string().min(1)),
    keepUrlPatterns: z.array(z.string().min(1)),
    noisePatterns: z.array(z.string().min(1)),
    unwantedTags: z.array(z.string().regex(/^[a-zA-Z][a-zA-Z0-9-]*$/)),
  })
  .partial()
  .strict();

/**
 * Merge a parsed rules file over the built-in rules and compile the result.
 *
 * @throws {ConfigError} If the value does not match {@link RuleFileSchema}
 *         or a pattern does not compile.
 */
export function rulesFromObject(value: unknown): ExtractionRules {
  const parsed = RuleFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "root";
    throw new ConfigError(
      `Invalid rules file at ${where}: ${issue?.message ?? "unknown error"}`,
    );
  }
  return compileRules({ ...DEFAULT_RULE_SOURCE, ...parsed.data });
}

/**
 * Read, validate and compile a JSON rules file.
 *
 * Called once at startup; the returned rules live for the whole process.
 *
 * @throws {ConfigError} If the file is missing, not JSON, or invalid.
 */
export async function loadRulesFile(filePath: string): Promise<ExtractionRules> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read rules file ${filePath}: ${errorMessage(error)}`,
    );
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Rules file ${filePath} is not valid JSON: ${errorMessage(error)}`,
    );
  }

  return rulesFromObject(value);
}
