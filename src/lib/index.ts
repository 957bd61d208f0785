/**
 * Core library exports for the File Hash Verifier
 */

export * from "./CancellationToken";
export * from "./DigestProvider";
export * from "./DigestEngine";
export * from "./FileWalker";
export * from "./ConcurrentScheduler";
export * from "./ManifestCodec";
export * from "./Verifier";
export * from "./HashVerifier";
export * from "./AuditLogger";
export * from "./MCPServer";
export * from "./MCPTools";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
