/**
 * Emitter module types
 */

export type DocumentFormat = "yaml" | "json";

export interface WriteResult {
  destination: string;
  format: DocumentFormat;
  bytes: number;
}
