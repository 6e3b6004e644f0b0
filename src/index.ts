export { defineConfig, loadWrapperConfig, resolveWrapperConfig } from "./config.js";
export { buildDocument } from "./builder.js";
export { emitDocument } from "./emitter.js";
export { FormattingError, PathMismatchError } from "./errors.js";
export { dartFormatter, formatDart, type Formatter } from "./formatter.js";
export { generateWrapper } from "./generator.js";
export { extractPrefix, resolveClassNames } from "./naming.js";
export {
	classifyAsset,
	generateForAsset,
	handleAssetChange,
	runGenerateStep,
} from "./pipeline.js";
export { CATALOGUE_SUFFIX, outputPathFor, WRAPPER_SUFFIX } from "./writer.js";
export type {
	ClassNameInfo,
	DocumentModel,
	GenerationOutcome,
	GenerationRequest,
	IntlWrapperConfig,
	ResolvedConfig,
} from "./types.js";
