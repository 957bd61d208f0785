/**
 * Core interfaces for the File Hash Verifier
 */

export * from "./ICancellationToken";
export * from "./IDigestProvider";
export * from "./IDigestEngine";
export * from "./IFileWalker";
export * from "./IConcurrentScheduler";
export * from "./IManifestCodec";
export * from "./IVerifier";
export * from "./IHashVerifier";
