/**
 * Archive client on the Internet Archive's S3-compatible API
 *
 * Each item is a bucket and each file a key. The item is created on the
 * first upload (`x-archive-auto-make-bucket`), and metadata travels as
 * `x-archive-meta-*` headers.
 */

import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { lookup as getMimeType } from "mime-types";
import { createReadStream, existsSync } from "node:fs";
import { stat } from "node:fs/promises";
import type { ArchiveConfig } from "../../types/config.js";
import type { ArchiveClient, UploadMetadata } from "../../types/uploader.js";
import { ArchiveUploadError, LocalFileMissingError } from "../errors.js";
import { lowAuthorization, type ArchiveCredentials } from "./credentials.js";

/**
 * Header carrying values that are not printable ASCII
 */
function encodeHeaderValue(value: string): string {
  return /^[\x20-\x7e]*$/.test(value) ? value : `uri(${encodeURIComponent(value)})`;
}

/**
 * Request headers for item metadata
 */
export function archiveMetadataHeaders(
  metadata: UploadMetadata
): Record<string, string> {
  return {
    "x-archive-auto-make-bucket": "1",
    "x-archive-meta-title": encodeHeaderValue(metadata.title),
    "x-archive-meta-mediatype": encodeHeaderValue(metadata.mediatype),
    "x-archive-meta-collection": encodeHeaderValue(metadata.collection),
    "x-archive-meta-description": encodeHeaderValue(metadata.description),
    "x-archive-meta-creator": encodeHeaderValue(metadata.creator),
    "x-archive-meta-subject": encodeHeaderValue(metadata.subject),
    "x-archive-meta-licenseurl": encodeHeaderValue(metadata.licenseUrl),
  };
}

function hasHeaders(
  request: unknown
): request is { headers: Record<string, string> } {
  return (
    typeof request === "object" &&
    request !== null &&
    "headers" in request &&
    typeof request.headers === "object" &&
    request.headers !== null
  );
}

/**
 * Create an S3 client pointed at the archive endpoint.
 * The archive authenticates with a `LOW key:secret` header instead of a
 * SigV4 signature, so the signed Authorization header is replaced after signing.
 */
export function createArchiveS3Client(
  endpoint: string,
  credentials: ArchiveCredentials
): S3Client {
  const client = new S3Client({
    region: "us-east-1",
    endpoint,
    forcePathStyle: true,
    credentials: {
      accessKeyId: credentials.accessKey,
      secretAccessKey: credentials.secretKey,
    },
    requestChecksumCalculation: "WHEN_REQUIRED",
    // Retries are handled by the uploader
    maxAttempts: 1,
  });

  const authorization = lowAuthorization(credentials);
  client.middlewareStack.add(
    (next) => async (args) => {
      if (hasHeaders(args.request)) {
        args.request.headers["authorization"] = authorization;
      }
      return next(args);
    },
    { step: "finalizeRequest", priority: "low", name: "archiveLowAuthorization" }
  );

  return client;
}

/**
 * HTTP status of an SDK error, when it has one
 */
function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "$metadata" in error &&
    typeof error.$metadata === "object" &&
    error.$metadata !== null &&
    "httpStatusCode" in error.$metadata &&
    typeof error.$metadata.httpStatusCode === "number"
  ) {
    return error.$metadata.httpStatusCode;
  }
  return undefined;
}

/**
 * ArchiveClient backed by the S3 API
 */
export class S3ArchiveClient implements ArchiveClient {
  constructor(private readonly client: S3Client) {}

  static fromConfig(
    archive: Pick<ArchiveConfig, "endpoint">,
    credentials: ArchiveCredentials
  ): S3ArchiveClient {
    return new S3ArchiveClient(
      createArchiveS3Client(archive.endpoint, credentials)
    );
  }

  async put(
    itemId: string,
    remotePath: string,
    localPath: string,
    metadata: UploadMetadata
  ): Promise<void> {
    if (!existsSync(localPath)) {
      throw new LocalFileMissingError(localPath);
    }

    const { size } = await stat(localPath);
    const body = createReadStream(localPath);
    const command = new PutObjectCommand({
      Bucket: itemId,
      Key: remotePath,
      Body: body,
      ContentLength: size,
      ContentType: getMimeType(localPath) || "application/octet-stream",
    });

    const headers = archiveMetadataHeaders(metadata);
    command.middlewareStack.add(
      (next) => async (args) => {
        if (hasHeaders(args.request)) {
          Object.assign(args.request.headers, headers);
        }
        return next(args);
      },
      { step: "build", name: "archiveMetadataHeaders" }
    );

    try {
      await this.client.send(command);
    } catch (error) {
      body.destroy();
      const statusCode = statusCodeOf(error);
      const reason = error instanceof Error ? error.message : String(error);
      throw new ArchiveUploadError(
        `Upload of ${itemId}/${remotePath} failed${
          statusCode ? ` (HTTP ${statusCode})` : ""
        }: ${reason}`,
        statusCode,
        { cause: error }
      );
    }
  }
}
