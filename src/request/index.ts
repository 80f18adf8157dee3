/**
 * Request entrypoint: builders turning operations into HTTP requests.
 * @module
 */
export {
  buildEvalRequest,
  buildGetRequest,
  buildInfoRequest,
  buildListLibrariesRequest,
  FORM_CONTENT_TYPE,
} from './builder.js';
export type { BindValue, BindVariables, CountingMode, EvalRequest, GetRequest, OutputFormat } from './types.js';
