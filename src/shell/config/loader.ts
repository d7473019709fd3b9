// PURITY: SHELL (reads configuration files; validation helpers are pure)
// EFFECT: Effect<BannerConfig, ConfigError>
// INVARIANT: Configuration is built once per run and never mutated afterwards
// COMPLEXITY: O(s + e) where s = style entries, e = exclusion names

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { PATH_PLACEHOLDER } from "../../core/strategies/base.js";
import type { BannerConfig } from "../../core/types/index.js";
import { fileURLToPath, fs, path } from "../utils/node-mods.js";

export const PROJECT_CONFIG_FILE = "path-banner.config.json";

const DEFAULTS_PATH = fileURLToPath(
	new URL("../../../config/defaults.json", import.meta.url),
);

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Settings a project may layer over the built-in defaults.
 *
 * @property styles Entries merged over the default table; "" disables a type
 * @property exclude Extra base names to never touch
 * @property maxFileSizeBytes Replacement size ceiling
 */
export interface ProjectOverrides {
	readonly styles?: ReadonlyMap<string, string>;
	readonly exclude?: ReadonlyArray<string>;
	readonly maxFileSizeBytes?: number;
}

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isPositiveInteger(value: JSONValue): value is number {
	return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function placeholderCount(template: string): number {
	return template.split(PATH_PLACEHOLDER).length - 1;
}

function readJson(
	filePath: string,
): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: (): JSONValue => {
			const parsed: JSONValue = JSON.parse(fs.readFileSync(filePath, "utf8"));
			return parsed;
		},
		catch: (error) =>
			new ConfigError({
				path: filePath,
				detail: error instanceof Error ? error.message : String(error),
			}),
	});
}

/**
 * Validates a `styles` object: string templates with at most one `{}`.
 * Keys are lowercased, matching how file-type keys are derived.
 */
function decodeStyles(
	value: JSONValue,
	source: string,
): Effect.Effect<ReadonlyMap<string, string>, ConfigError> {
	if (!isJSONObject(value)) {
		return Effect.fail(
			new ConfigError({ path: source, detail: "styles must be an object" }),
		);
	}
	const styles = new Map<string, string>();
	for (const [key, template] of Object.entries(value)) {
		if (typeof template !== "string" || placeholderCount(template) > 1) {
			return Effect.fail(
				new ConfigError({
					path: source,
					detail: `style "${key}" must be a string with at most one ${PATH_PLACEHOLDER}`,
				}),
			);
		}
		styles.set(key.toLowerCase(), template);
	}
	return Effect.succeed(styles);
}

function fieldError(source: string, detail: string): ConfigError {
	return new ConfigError({ path: source, detail });
}

/**
 * Decodes the packaged defaults file.
 */
function decodeDefaults(
	value: JSONValue,
	source: string,
): Effect.Effect<BannerConfig, ConfigError> {
	return Effect.gen(function* () {
		if (!isJSONObject(value)) {
			return yield* Effect.fail(fieldError(source, "expected an object"));
		}
		const { maxFileSizeBytes, alwaysSkip } = value;
		if (maxFileSizeBytes === undefined || !isPositiveInteger(maxFileSizeBytes)) {
			return yield* Effect.fail(
				fieldError(source, "maxFileSizeBytes must be a positive integer"),
			);
		}
		if (alwaysSkip === undefined || !isStringArray(alwaysSkip)) {
			return yield* Effect.fail(
				fieldError(source, "alwaysSkip must be an array of strings"),
			);
		}
		const styles = yield* decodeStyles(value["styles"] ?? null, source);
		return {
			styles,
			alwaysSkip: new Set(alwaysSkip),
			maxFileSizeBytes,
		};
	});
}

/**
 * Decodes a project override file; every field is optional.
 */
function decodeOverrides(
	value: JSONValue,
	source: string,
): Effect.Effect<ProjectOverrides, ConfigError> {
	return Effect.gen(function* () {
		if (!isJSONObject(value)) {
			return yield* Effect.fail(fieldError(source, "expected an object"));
		}
		const { styles, exclude, maxFileSizeBytes } = value;
		if (exclude !== undefined && !isStringArray(exclude)) {
			return yield* Effect.fail(
				fieldError(source, "exclude must be an array of strings"),
			);
		}
		if (maxFileSizeBytes !== undefined && !isPositiveInteger(maxFileSizeBytes)) {
			return yield* Effect.fail(
				fieldError(source, "maxFileSizeBytes must be a positive integer"),
			);
		}
		const decodedStyles =
			styles === undefined ? undefined : yield* decodeStyles(styles, source);
		return {
			...(decodedStyles === undefined ? {} : { styles: decodedStyles }),
			...(exclude === undefined ? {} : { exclude }),
			...(maxFileSizeBytes === undefined ? {} : { maxFileSizeBytes }),
		};
	});
}

/**
 * Layers project overrides over the defaults (pure).
 *
 * @postcondition defaults are not mutated
 */
export function mergeConfig(
	defaults: BannerConfig,
	overrides: ProjectOverrides,
): BannerConfig {
	return {
		styles: new Map([...defaults.styles, ...(overrides.styles ?? [])]),
		alwaysSkip: new Set([...defaults.alwaysSkip, ...(overrides.exclude ?? [])]),
		maxFileSizeBytes: overrides.maxFileSizeBytes ?? defaults.maxFileSizeBytes,
	};
}

export function loadDefaultConfig(
	defaultsPath = DEFAULTS_PATH,
): Effect.Effect<BannerConfig, ConfigError> {
	return readJson(defaultsPath).pipe(
		Effect.flatMap((json) => decodeDefaults(json, defaultsPath)),
	);
}

/**
 * Reads `path-banner.config.json` from `cwd`.
 *
 * @returns null when the project has no such file
 */
export function loadProjectOverrides(
	cwd: string,
): Effect.Effect<ProjectOverrides | null, ConfigError> {
	const configPath = path.join(cwd, PROJECT_CONFIG_FILE);
	if (!fs.existsSync(configPath)) return Effect.succeed(null);
	return readJson(configPath).pipe(
		Effect.flatMap((json) => decodeOverrides(json, configPath)),
	);
}

/**
 * Loads defaults and applies the project's overrides. An invalid project
 * file is reported and ignored; invalid defaults fail the effect.
 *
 * @pure false (filesystem reads, console.warn)
 */
export function loadBannerConfig(
	cwd: string,
	defaultsPath = DEFAULTS_PATH,
): Effect.Effect<BannerConfig, ConfigError> {
	return Effect.gen(function* () {
		const defaults = yield* loadDefaultConfig(defaultsPath);
		const overrides = yield* loadProjectOverrides(cwd).pipe(
			Effect.catchTag("Config", (error) =>
				Effect.sync(() => {
					console.warn(`⚠️  Ignoring ${error.path}: ${error.detail}`);
				}).pipe(Effect.as(null)),
			),
		);
		return overrides === null ? defaults : mergeConfig(defaults, overrides);
	});
}
