export {
	type HeaderStrategy,
	matchesHeaderShape,
	normalizeBannerPath,
	renderHeader,
	type StrategyKind,
} from "./base.js";
export {
	fileTypeKey,
	isAlwaysSkipped,
	lookupStyle,
	selectStrategy,
} from "./selector.js";
export {
	buildRecipeStrategy,
	declarationStrategy,
	frontmatterStrategy,
	scriptMetadataStrategy,
	shebangStrategy,
	tagOpeningStrategy,
} from "./variants.js";
