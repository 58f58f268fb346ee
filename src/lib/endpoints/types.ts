/**
 * Endpoint module types
 */

export interface EndpointParserOptions {
  /** Port implied by each scheme; schemes absent here need an explicit port */
  defaultPorts: Readonly<Record<string, number>>;
}

export type EndpointSourceKind = "file" | "url";

export interface EndpointSourceOptions {
  kind: EndpointSourceKind;
  location: string;
  /** Upper bound on the HTTP fetch, ignored for files */
  timeoutMs?: number;
}
