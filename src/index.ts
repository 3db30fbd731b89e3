export {
  type TErrorName,
  isErrorName,
  type IErrorDetail,
  type IErrorLike,
  errorDetails,
  UrlPartsError,
  InvalidPortError,
  InvalidAuthorityError,
  InvalidHostError,
  InvalidSchemeError,
  ImmutableStateError,
  UrlPartsWarning,
  ConflictWarning,
  EncodingWarning
} from './errors.js'
export {
  type TWarningHandler,
  type TUrlPartsConfig,
  type TUrlPartsOptions,
  consoleWarningHandler,
  normalizeUrlPartsOptions
} from './options.js'
export {
  type UOptional,
  type TQueryKey,
  type TQueryValue,
  type TQueryValueOrList
} from './types.js'
export {
  quote,
  quotePlus,
  unquote,
  unquotePlus
} from './codec/percent.js'
export {
  COLON_SEPARATED_SCHEMES,
  defaultPortOf,
  isColonSeparatedScheme
} from './codec/schemes.js'
export {
  type TSplitUrl,
  getScheme,
  stripScheme,
  setScheme,
  splitUrl,
  unsplitUrl,
  removeDotSegments,
  resolveReference,
  joinUrl
} from './codec/split.js'
export {
  isValidScheme,
  isValidEncodedPathSegment,
  isValidEncodedQueryKey,
  isValidEncodedQueryValue,
  isValidHost,
  isStrictValidHost,
  isValidPort,
  resemblesIpv6Literal
} from './codec/validators.js'
export {
  type TNetlocParts,
  type TAuthorityJson,
  parseNetloc,
  Authority
} from './components/Authority.js'
export {
  type TFragmentAddOptions,
  type TFragmentSetOptions,
  type TFragmentRemoveOptions,
  type TFragmentJson,
  Fragment
} from './components/Fragment.js'
export {
  SAFE_SEGMENT_CHARS,
  type TPathAbsoluteMode,
  type TPathInput,
  type TPathJson,
  joinPathSegments,
  removePathSegments,
  normpath,
  Path
} from './components/Path.js'
export {
  SAFE_KEY_CHARS,
  SAFE_VALUE_CHARS,
  type TQueryInput,
  type TQueryRemoveInput,
  type TQueryEncodeOptions,
  Query
} from './components/Query.js'
export {
  type TQueryParamsItem,
  type TQueryParamsInput,
  QueryParams
} from './components/QueryParams.js'
export {
  type TUrlAddOptions,
  type TUrlSetOptions,
  type TUrlRemoveOptions,
  type TUrlJson,
  Url
} from './Url.js'
