/**
 * A model row as reported by the runner's `list` command.
 * Recreated on every inventory refresh and never persisted.
 */
export interface ModelRecord {
  name: string;       // Runner identity, e.g. "llama3:8b-instruct-q4_K_M"
  id: string;         // Short digest prefix
  sizeBytes: number;  // Parsed from the size column
  modifiedAt: Date;   // Resolved against the refresh time
  size: string;       // Size as printed, e.g. "4.7 GB"
  modified: string;   // Modified column as printed, e.g. "2 weeks ago"
}

/**
 * On-demand detail for a single model (runner `show` command)
 */
export interface ModelDetails {
  name: string;
  architecture?: string;
  parameters?: string;          // e.g. "8.0B"
  contextLength?: number;
  embeddingLength?: number;
  quantization?: string;        // e.g. "Q4_K_M"
  capabilities: string[];       // As reported by the runner, e.g. ["completion", "vision"]
  license?: string;             // First line of the license section
  template?: string;
  raw: string;
}
