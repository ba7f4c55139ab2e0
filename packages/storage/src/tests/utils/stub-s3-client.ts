import {
  type ListObjectsV2CommandOutput,
  S3Client,
  type ServiceInputTypes,
} from "@aws-sdk/client-s3"
import type { MemoryStorage } from "../../adapters/memory-storage"

export type ListRequest = {
  bucket?: string
  cursor?: string
  maxKeys?: number
  prefix?: string
}

export type ListResponder = (
  request: ListRequest,
) => ListObjectsV2CommandOutput | Promise<ListObjectsV2CommandOutput>

export type StubS3Client = {
  client: S3Client
  requests: ListRequest[]
}

function toListRequest(input: ServiceInputTypes): ListRequest {
  const request: ListRequest = {}

  if ("Bucket" in input && typeof input.Bucket === "string") request.bucket = input.Bucket
  if ("ContinuationToken" in input && typeof input.ContinuationToken === "string") {
    request.cursor = input.ContinuationToken
  }
  if ("MaxKeys" in input && typeof input.MaxKeys === "number") request.maxKeys = input.MaxKeys
  if ("Prefix" in input && typeof input.Prefix === "string") request.prefix = input.Prefix

  return request
}

/**
 * Real S3Client whose requests are answered in process by `respond`, before any
 * endpoint resolution, signing or network I/O happens.
 */
export function createStubS3Client(respond: ListResponder): StubS3Client {
  const client = new S3Client({
    region: "us-east-1",
    endpoint: "http://storage.test",
    forcePathStyle: true,
    maxAttempts: 1,
    credentials: { accessKeyId: "test-access-key", secretAccessKey: "test-secret" },
  })
  const requests: ListRequest[] = []

  client.middlewareStack.add(
    () => async (args) => {
      const request = toListRequest(args.input)
      requests.push(request)

      return { output: await respond(request), response: {} }
    },
    { step: "initialize", priority: "high", name: "stubListObjectsV2" },
  )

  return { client, requests }
}

/** Responder that answers ListObjectsV2 from a MemoryStorage, the way S3 shapes pages. */
export function respondFromMemory(backing: MemoryStorage): ListResponder {
  return async (request) => {
    const page = await backing.list(request.bucket ?? "", {
      ...(request.cursor && { cursor: request.cursor }),
      ...(request.maxKeys && { maxKeys: request.maxKeys }),
      ...(request.prefix && { prefix: request.prefix }),
    })

    return {
      $metadata: {},
      Contents: page.objects.map((o) => ({
        Key: o.key,
        Size: o.sizeInBytes,
        LastModified: o.lastModified,
      })),
      KeyCount: page.objects.length,
      IsTruncated: page.cursor !== undefined,
      ...(page.cursor && { NextContinuationToken: page.cursor }),
    }
  }
}
