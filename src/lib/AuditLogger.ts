/**
 * Structured audit log
 *
 * Writes one JSON object per line to stderr; stdout belongs to the MCP
 * transport.
 */

export class AuditLogger {
  private readonly enabled: boolean;

  constructor(enabled: boolean = true) {
    this.enabled = enabled;
  }

  audit(operation: string, paths: string[], result: string): void {
    this.write({ level: "AUDIT", operation, paths, result });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write({ level: "WARN", message, context });
  }

  private write(entry: Record<string, unknown>): void {
    if (!this.enabled) {
      return;
    }
    console.error(
      JSON.stringify({ timestamp: new Date().toISOString(), ...entry })
    );
  }
}
