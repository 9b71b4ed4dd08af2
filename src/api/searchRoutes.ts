import { IncomingMessage } from "node:http";
import { z } from "zod";
import {
  OperationErrorKind,
  OperationResult,
  ValidationError,
  toOperationError,
} from "../domain/errors.js";
import { RetrievalService } from "../services/retrievalService.js";

export interface ApiReply {
  status: number;
  body: unknown;
}

export interface SearchRoutesContext {
  retrieval: RetrievalService;
  maxUploadBytes: number;
}

const limitParam = z.coerce.number().int().optional();

const textSearchQuerySchema = z.object({
  q: z.string().default(""),
  type: z.enum(["text", "image", "audio"]),
  limit: limitParam,
});

const keywordSearchQuerySchema = z.object({
  q: z.string().default(""),
  type: z.enum(["text", "image"]).default("text"),
  limit: limitParam,
});

const fileSearchBodySchema = z.object({
  type: z.enum(["image", "audio"]),
  limit: z.number().int().optional(),
  filename: z.string().min(1),
  content_base64: z.string().min(1),
});

const STATUS_BY_KIND: Record<OperationErrorKind, number> = {
  validation: 400,
  malformed_content: 400,
  transient_io: 502,
  backend: 502,
  internal: 500,
};

export function statusForErrorKind(kind: OperationErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function isSearchRoute(pathname: string): boolean {
  return pathname === "/search" || pathname === "/search/keyword" || pathname === "/stats";
}

/**
 * REST surface over the retrieval service. Error values become HTTP
 * statuses here and nowhere else.
 */
export async function handleSearchRoute(
  req: IncomingMessage,
  url: URL,
  context: SearchRoutesContext,
): Promise<ApiReply> {
  try {
    if (url.pathname === "/stats") {
      if (req.method !== "GET") return methodNotAllowed();
      return toReply(await context.retrieval.countRecords());
    }

    if (url.pathname === "/search/keyword") {
      if (req.method !== "GET") return methodNotAllowed();
      const params = keywordSearchQuerySchema.parse(Object.fromEntries(url.searchParams));
      return toReply(
        await context.retrieval.searchByKeyword({
          query: params.q,
          modality: params.type,
          limit: params.limit,
        }),
      );
    }

    if (req.method === "GET") {
      const params = textSearchQuerySchema.parse(Object.fromEntries(url.searchParams));
      return toReply(
        await context.retrieval.searchByText({
          query: params.q,
          modality: params.type,
          limit: params.limit,
        }),
      );
    }

    if (req.method === "POST") {
      const body = fileSearchBodySchema.parse(
        await readJsonBody(req, maxJsonBytesFor(context.maxUploadBytes)),
      );
      return toReply(
        await context.retrieval.searchByFile({
          data: Buffer.from(body.content_base64, "base64"),
          filename: body.filename,
          modality: body.type,
          limit: body.limit,
        }),
      );
    }

    return methodNotAllowed();
  } catch (error) {
    if (error instanceof z.ZodError) {
      return errorReply("validation", formatZodError(error));
    }
    const operationError = toOperationError(error);
    return errorReply(operationError.kind, operationError.message);
  }
}

export async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buffer.length;
    if (total > maxBytes) {
      throw new ValidationError(`Request body exceeds ${maxBytes} bytes.`);
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ValidationError("Invalid JSON body", { cause: error });
  }
}

// Base64 inflates by 4/3; leave room for the other fields.
function maxJsonBytesFor(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

function toReply<T>(result: OperationResult<T>): ApiReply {
  if (result.ok) {
    return { status: 200, body: result.value };
  }
  return errorReply(result.error.kind, result.error.message);
}

function errorReply(kind: OperationErrorKind, message: string): ApiReply {
  return { status: statusForErrorKind(kind), body: { error: { kind, message } } };
}

function methodNotAllowed(): ApiReply {
  return { status: 405, body: { error: { kind: "validation", message: "Method not allowed" } } };
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
