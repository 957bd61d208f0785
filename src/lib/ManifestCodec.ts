/**
 * Manifest codec implementation
 *
 * Persisted documents use snake_case keys so files written by earlier
 * releases remain readable. Both directions go through zod schemas; nothing
 * read from disk is trusted before it has been validated.
 */

import { z } from "zod";
import {
  CorruptionRecord,
  FileRecord,
  IManifestCodec,
  Manifest,
  VerificationOutcome,
  VerificationReport,
  VerificationSummary,
} from "../interfaces/IManifestCodec";
import { InvalidManifestError } from "../types";
import { ErrorHandler } from "./ErrorHandler";
import { AlgorithmIdSchema, DIGEST_HEX_LENGTH } from "./DigestProvider";

export const APP_NAME = "file-hash-verifier";
export const APP_VERSION = "0.1.0";
const APPLICATION = `${APP_NAME} ${APP_VERSION}`;

const SUMMARY_KEYS: readonly (keyof VerificationSummary)[] = [
  "matches",
  "mismatches",
  "notFound",
  "readErrors",
  "verificationErrors",
];

const HexDigestSchema = z
  .string()
  .regex(/^[0-9a-f]+$/, "Digest must be a lowercase hex string");

/**
 * Turn a parsed JSON object into a Map before validation
 *
 * zod's record output skips a "__proto__" key, which is a legal file name.
 */
function toKeyedMap(value: unknown): unknown {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return new Map(Object.entries(value));
  }
  return value;
}

const HashEntrySchema = z.object({
  hash: HexDigestSchema,
  full_path: z.string().default(""),
  size: z.number().int().nonnegative().default(0),
  modified: z.number().default(0),
});

const ManifestDocumentSchema = z
  .object({
    metadata: z.object({
      algorithm: AlgorithmIdSchema,
      scan_location: z.string(),
      timestamp: z.string(),
      total_files: z.number().int().nonnegative().optional(),
      error_files: z.number().int().nonnegative().optional(),
      application: z.string().optional(),
    }),
    hashes: z.preprocess(toKeyedMap, z.map(z.string(), HashEntrySchema)),
    errors: z.array(z.string()).default([]),
  })
  .superRefine((doc, ctx) => {
    const expected = DIGEST_HEX_LENGTH[doc.metadata.algorithm];
    for (const [key, entry] of doc.hashes) {
      if (entry.hash.length !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["hashes", key, "hash"],
          message: `Expected ${expected} hex digits for ${doc.metadata.algorithm}, got ${entry.hash.length}`,
        });
      }
    }
  });

const CorruptedFileSchema = z.object({
  path: z.string(),
  relative_path: z.string(),
  stored_hash: HexDigestSchema,
  current_hash: HexDigestSchema,
  algorithm: AlgorithmIdSchema,
});

const SummarySchema = z.object({
  matches: z.number().int().nonnegative(),
  mismatches: z.number().int().nonnegative(),
  not_found: z.number().int().nonnegative(),
  read_errors: z.number().int().nonnegative(),
  verification_errors: z.number().int().nonnegative(),
});

const ReportDocumentSchema = z
  .object({
    metadata: z.object({
      verification_time: z.string(),
      source_hash_file: z.string(),
      total_files_checked: z.number().int().nonnegative().optional(),
      corrupted_files: z.number().int().nonnegative().optional(),
      error_files: z.number().int().nonnegative().optional(),
      cancelled: z.boolean().default(false),
      application: z.string().optional(),
    }),
    summary: SummarySchema,
    detailed_results: z.preprocess(
      toKeyedMap,
      z.map(
        z.string(),
        z.enum(["MATCH", "MISMATCH", "FILE_NOT_FOUND", "READ_ERROR", "VERIFICATION_ERROR"])
      )
    ),
    corrupted_files: z.array(CorruptedFileSchema).default([]),
    errors: z.array(z.string()).default([]),
  })
  .superRefine((doc, ctx) => {
    const tally = tallyOutcomes(Object.fromEntries(doc.detailed_results));
    const stored = fromSummaryDocument(doc.summary);
    for (const key of SUMMARY_KEYS) {
      if (tally[key] !== stored[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["summary"],
          message: `Summary ${key} is ${stored[key]} but detailed_results contain ${tally[key]}`,
        });
      }
    }
  });

/**
 * Count outcomes by kind
 */
export function tallyOutcomes(
  outcomes: Record<string, VerificationOutcome>
): VerificationSummary {
  const summary: VerificationSummary = {
    matches: 0,
    mismatches: 0,
    notFound: 0,
    readErrors: 0,
    verificationErrors: 0,
  };
  for (const outcome of Object.values(outcomes)) {
    switch (outcome) {
      case "MATCH":
        summary.matches++;
        break;
      case "MISMATCH":
        summary.mismatches++;
        break;
      case "FILE_NOT_FOUND":
        summary.notFound++;
        break;
      case "READ_ERROR":
        summary.readErrors++;
        break;
      case "VERIFICATION_ERROR":
        summary.verificationErrors++;
        break;
    }
  }
  return summary;
}

function fromSummaryDocument(
  summary: z.infer<typeof SummarySchema>
): VerificationSummary {
  return {
    matches: summary.matches,
    mismatches: summary.mismatches,
    notFound: summary.not_found,
    readErrors: summary.read_errors,
    verificationErrors: summary.verification_errors,
  };
}

/**
 * Name of the text listing written beside a JSON document
 *
 * `scan.json` with suffix `_errors` becomes `scan_errors.txt`; names without
 * a `.json` extension get the suffix appended.
 */
export function companionPath(outputPath: string, suffix: string): string {
  return outputPath.endsWith(".json")
    ? `${outputPath.slice(0, -".json".length)}${suffix}.txt`
    : `${outputPath}${suffix}.txt`;
}

function parseDocument<T extends z.ZodTypeAny>(
  schema: T,
  text: string,
  kind: string
): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidManifestError(`${kind} is not valid JSON`, [
      ErrorHandler.describe(error),
    ]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidManifestError(
      `Invalid ${kind.toLowerCase()} format`,
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

export class ManifestCodec implements IManifestCodec {
  encode(manifest: Manifest): string {
    const hashes: Record<string, z.input<typeof HashEntrySchema>> =
      Object.fromEntries(
        Object.entries(manifest.entries).map(
          ([key, record]): [string, z.input<typeof HashEntrySchema>] => [
            key,
            {
              hash: record.digest,
              full_path: record.path,
              size: record.size,
              modified: record.modified,
            },
          ]
        )
      );

    const document = {
      metadata: {
        algorithm: manifest.algorithm,
        scan_location: manifest.scanLocation,
        timestamp: manifest.createdAt,
        total_files: Object.keys(hashes).length,
        error_files: manifest.errors.length,
        application: APPLICATION,
      },
      hashes,
      errors: manifest.errors,
    };
    return JSON.stringify(document, null, 2);
  }

  decode(text: string): Manifest {
    const document = parseDocument(ManifestDocumentSchema, text, "Hash file");

    const entries: Record<string, FileRecord> = Object.fromEntries(
      Array.from(document.hashes, ([key, entry]): [string, FileRecord] => [
        key,
        {
          path: entry.full_path,
          digest: entry.hash,
          size: entry.size,
          modified: entry.modified,
        },
      ])
    );

    return {
      algorithm: document.metadata.algorithm,
      scanLocation: document.metadata.scan_location,
      createdAt: document.metadata.timestamp,
      entries,
      errors: document.errors,
    };
  }

  encodeReport(report: VerificationReport): string {
    const document = {
      metadata: {
        verification_time: report.verifiedAt,
        source_hash_file: report.sourceManifest,
        total_files_checked: Object.keys(report.outcomes).length,
        corrupted_files: report.corrupted.length,
        error_files: report.errors.length,
        cancelled: report.cancelled,
        application: APPLICATION,
      },
      summary: {
        matches: report.summary.matches,
        mismatches: report.summary.mismatches,
        not_found: report.summary.notFound,
        read_errors: report.summary.readErrors,
        verification_errors: report.summary.verificationErrors,
      },
      detailed_results: report.outcomes,
      corrupted_files: report.corrupted.map((record) => ({
        path: record.currentPath,
        relative_path: record.relativePath,
        stored_hash: record.expectedDigest,
        current_hash: record.actualDigest,
        algorithm: record.algorithm,
      })),
      errors: report.errors,
    };
    return JSON.stringify(document, null, 2);
  }

  decodeReport(text: string): VerificationReport {
    const document = parseDocument(
      ReportDocumentSchema,
      text,
      "Verification report"
    );

    const corrupted: CorruptionRecord[] = document.corrupted_files.map(
      (entry) => ({
        relativePath: entry.relative_path,
        currentPath: entry.path,
        algorithm: entry.algorithm,
        expectedDigest: entry.stored_hash,
        actualDigest: entry.current_hash,
      })
    );

    return {
      sourceManifest: document.metadata.source_hash_file,
      verifiedAt: document.metadata.verification_time,
      outcomes: Object.fromEntries(document.detailed_results),
      corrupted,
      errors: document.errors,
      summary: fromSummaryDocument(document.summary),
      cancelled: document.metadata.cancelled,
    };
  }

  formatErrorListing(manifest: Manifest, generatedAt: Date = new Date()): string {
    const lines = [
      `Error Report - ${generatedAt.toISOString()}`,
      `Scan Location: ${manifest.scanLocation}`,
      `Algorithm: ${manifest.algorithm}`,
      "",
      "Files with errors:",
      "=".repeat(50),
      ...manifest.errors,
    ];
    return lines.join("\n") + "\n";
  }

  formatCorruptionListing(
    report: VerificationReport,
    generatedAt: Date = new Date()
  ): string {
    let text =
      `Corrupted Files Report - ${generatedAt.toISOString()}\n` +
      `Source: ${report.sourceManifest}\n` +
      `Total corrupted files: ${report.corrupted.length}\n\n`;

    report.corrupted.forEach((record, index) => {
      text +=
        `${index + 1}. ${record.relativePath}\n` +
        `   Full Path: ${record.currentPath}\n` +
        `   Algorithm: ${record.algorithm}\n` +
        `   Expected:  ${record.expectedDigest}\n` +
        `   Actual:    ${record.actualDigest}\n\n`;
    });
    return text;
  }
}
