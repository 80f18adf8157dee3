/** Serialization formats the server can produce for `eval`. */
export type OutputFormat = 'items' | 'xml' | 'html' | 'xhtml';

/** How the server counts result items, `items` format only. */
export type CountingMode = 'exact' | 'estimated' | 'none';

/** Value bound to an external query variable. */
export type BindValue = string | number | boolean;

/** Bind variables by name, encoded in iteration order. */
export type BindVariables = Readonly<Record<string, BindValue>> | ReadonlyMap<string, BindValue>;

/** Parameters of an `eval` call. */
export interface EvalRequest {
  /** Query expression, sent as-is */
  expression: string;
  /** Library to query; falls back to the connection's default library */
  library?: string;
  /** External variables, sent as `$name` fields */
  bindVariables?: BindVariables;
  /** Result serialization; the server defaults to `xml` */
  format?: OutputFormat;
  /** `profile` returns an execution profile instead of results, `items` format only */
  mode?: 'profile';
  /** Server-side time limit, in milliseconds */
  maxtime?: number;
  /** Item counting mode, `items` format only */
  counting?: CountingMode;
  /** Maximum number of items returned, `items` format only */
  count?: number;
  /** Rank of the first item returned, starting at 1, `items` format only */
  first?: number;
}

/** Parameters of a `get` call. */
export interface GetRequest {
  /** Path of the document inside the library */
  path: string;
  /** Library holding the document; falls back to the connection's default library */
  library?: string;
}
