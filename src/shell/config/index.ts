// PURITY: Re-exports only
export { parseCLIArgs } from "./cli.js";
export {
	loadBannerConfig,
	loadDefaultConfig,
	loadProjectOverrides,
	mergeConfig,
	PROJECT_CONFIG_FILE,
	type ProjectOverrides,
} from "./loader.js";
