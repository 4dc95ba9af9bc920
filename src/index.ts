// Value model
export {
	ActiveType,
	BoolNames,
	BoolTag,
	NIL_FEATURE,
	ValueKind,
	booleanFeature,
	featureToString,
	featureType,
	integerFeature,
	ipFeature,
	listFeature,
	parseIntegerLiteral,
	parseIpLiteral,
	stringFeature,
	textOf,
} from "./types.ts";
export type {
	BooleanFeature,
	Feature,
	IntegerFeature,
	IpAddress,
	IpFeature,
	ListFeature,
	NilFeature,
	StringFeature,
	Text,
	ValueMask,
} from "./types.ts";
export { Lexicon } from "./lexicon.ts";
export { Arena, ArenaReleasedError, ArenaView, DEFAULT_CHUNK_SIZE } from "./arena.ts";

// Hooks
export {
	ALL_HOOKS,
	HOOKS,
	HOOK_COUNT,
	Hook,
	HookName,
	hookAt,
	hookMask,
	maskAllows,
	maskHooks,
} from "./hook.ts";
export type { HookMask } from "./hook.ts";

// Diagnostics
export { Errata, Mark, fail } from "./errata.ts";
export type { Note, NoteLevel } from "./errata.ts";
export { logger } from "./logger.ts";
export type { Logger } from "./logger.ts";

// YAML
export { CfgNode, PLAIN_TAG, QUOTED_TAG, YamlSource, parseYamlText } from "./node.ts";
export type { CfgEntry } from "./node.ts";

// Extractors and modifiers
export {
	ARG_PREFIX,
	ARG_SUFFIX,
	DuplicateExtractorError,
	ExtractorRegistry,
	ExtractorRegistryBuilder,
	ExtractorSpec,
	parseArg,
} from "./extractor.ts";
export type { Extractor, NameWithArg, SpecType } from "./extractor.ts";
export { DuplicateModifierError, ModifierRegistry, ModifierRegistryBuilder } from "./modifier.ts";
export type { Modifier, ModifierLoad, ModifierLoader } from "./modifier.ts";
export { parseFormat, parseSpecifier } from "./format.ts";
export type { FormatPiece, SpecifierParts } from "./format.ts";

// Expressions
export {
	compositeExpr,
	describeExpr,
	exprChildren,
	extractorExpr,
	featureExpr,
	isConstant,
	listExpr,
	nilExpr,
	withModifier,
} from "./expr.ts";
export type {
	CompositeExpr,
	Expr,
	ExtractorExpr,
	FeatureExpr,
	ListExpr,
	NilExpr,
} from "./expr.ts";
export {
	LITERAL_TAG,
	parseCompositeExpr,
	parseExpr,
	parseExprWithMods,
	parseScalarExpr,
	parseUnquotedExpr,
	validateSpec,
} from "./expr-compiler.ts";
export { NO_CAPTURE, ParseContext } from "./context.ts";
export type { ActiveCapture } from "./context.ts";

// Directives
export {
	DO_KEY,
	Directive,
	DirectiveList,
	DirectiveRegistry,
	DirectiveRtti,
	DuplicateDirectiveError,
	NilDirective,
	RegistryError,
	RegistryFrozenError,
	walkDirectives,
} from "./directive.ts";
export type {
	DirectiveDescriptor,
	DirectiveInfo,
	DirectiveLoad,
	DirectiveLoader,
	TypeInitializer,
} from "./directive.ts";
export {
	DEBUG_KEY,
	Debug,
	IGNORE_CASE_KEY,
	MAX_STATUS,
	MIN_STATUS,
	PROXY_REPLY_KEY,
	ProxyReply,
	SELECT_KEY,
	WHEN_KEY,
	WITH_KEY,
	When,
	With,
	WithCase,
	defaultDirectives,
	registerBuiltins,
} from "./directives/index.ts";
export {
	ANY_OF_KEY,
	AnyOfComparison,
	COMPARISON_KEYS,
	MAX_PATTERN_LENGTH,
	RegexComparison,
	TextComparison,
	captureCount,
	compileComparison,
	isComparisonKey,
} from "./comparison.ts";
export type { Comparison, ComparisonKey, TextComparisonKey } from "./comparison.ts";

// Compiler instance
export { Config, ROOT_PATH } from "./config.ts";
export type { ConfigOptions } from "./config.ts";
export { LoadOptionsSchema, compileText, loadFile, resolveLoadOptions } from "./options.ts";
export type { LoadOptions, ResolvedLoadOptions } from "./options.ts";
