/** One problem found in a manifest, located by its field path */
export interface ManifestIssue {
  /** Dotted field path such as `spec.ports[0].port`, or `line:col` for parse errors; empty for the document root */
  path: string;
  /** Human-readable description */
  message: string;
}
