// ============================================================================
// Dispatcher
// ============================================================================
export {
  createDispatcher,
  Dispatcher,
  dispatcherConfigSchema,
  type CallRouteOptions,
  type DispatcherConfig,
} from "./api/dispatcher";

export {
  RequestMiddlewareInputContext,
  type DispatchMiddleware,
} from "./api/request-middleware";

// ============================================================================
// Route Definition
// ============================================================================
export { defineRoute, defineRoutes, isRouteDefinition } from "./api/route";

export type {
  AnyRouteDefinition,
  HTTPMethod,
  RouteConfig,
  RouteDefinition,
  RouteMethod,
} from "./api/api";

export { RequestInputContext, type RouteInput } from "./api/request-input-context";
export { RequestOutputContext } from "./api/request-output-context";
export { RequestBody } from "./api/request-body";

export { RouteRegistry, type RouteResolution, type RoutableEntry } from "./api/internal/router";

export {
  buildPath,
  compilePathPattern,
  extractPathParams,
  matchPath,
  type ExtractPathParams,
  type ExtractPathParamNames,
  type ExtractPathParamsOrWiden,
  type HasPathParams,
  type PathMatch,
  type PathPattern,
  type PathSegment,
} from "./api/internal/path";

// ============================================================================
// Content Negotiation
// ============================================================================
export {
  InvalidMediaTypeError,
  MediaType,
  MediaTypes,
  resolveMediaType,
  resolveMediaTypes,
  sortByPreference,
  type MediaTypeLike,
} from "./http/media-type";

export {
  negotiateConsumes,
  negotiateProduces,
  type ConsumesNegotiation,
  type ProducesNegotiation,
} from "./api/negotiation";

// ============================================================================
// Body Conversion
// ============================================================================
export {
  BodyConverterRegistry,
  bodyShapes,
  conformsToShape,
  defineConverter,
  isBodyConverter,
  resolveContentType,
  shapeOf,
  type BodyConverter,
  type BodyConverterOptions,
  type BodyConverterRegistryOptions,
  type BodyShape,
  type BodyShapes,
  type BodySource,
  type BodyTarget,
} from "./api/converter";

export {
  assetConverter,
  bytesConverter,
  defaultConverters,
  formConverter,
  htmlDebugConverter,
  jsonConverter,
  lastResortConverters,
  readTextConverter,
  textConverter,
} from "./api/converters";

export {
  createAsset,
  defineAssetRoute,
  isAsset,
  memoryAssets,
  type Asset,
  type AssetOptions,
  type AssetSource,
} from "./api/asset";

// ============================================================================
// Errors, Logging and HTTP
// ============================================================================
export {
  ApiError,
  ApiValidationError,
  BodyReadError,
  MalformedPatternError,
  NoConverterError,
} from "./api/error";

export { isLogger, logWithLogger, type Logger, type LogLevel } from "./util/logger";

export {
  isContentlessStatus,
  type ContentfulStatusCode,
  type ContentlessStatusCode,
  type StatusCode,
} from "./http/http-status";
