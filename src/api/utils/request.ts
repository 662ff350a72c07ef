/**
 * API Request Helpers
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import { failure, success, type ImageUpload, type Result } from '../../types/index.js';

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * Read and shape-check a JSON body. Field rules are left to the services.
 */
export async function readJsonBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S
): Promise<Result<z.infer<S>>> {
  let rawBody: unknown;
  try {
    rawBody = await c.req.json();
  } catch {
    return failure('VALIDATION_ERROR', 'Request body must be valid JSON');
  }

  const validation = schema.safeParse(rawBody);
  if (!validation.success) {
    return failure(
      'VALIDATION_ERROR',
      validation.error.issues[0]?.message ?? 'Invalid request body',
      {
        issues: validation.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`
        ),
      }
    );
  }
  return success(validation.data);
}

/**
 * Read the `file` part of a multipart upload
 */
export async function readImageUpload(c: Context): Promise<Result<ImageUpload>> {
  let form: FormData;
  try {
    form = await c.req.formData();
  } catch {
    return failure('VALIDATION_ERROR', 'Request body must be multipart form data');
  }

  const file = form.get('file');
  if (file === null || typeof file === 'string') {
    return failure('VALIDATION_ERROR', 'A file is required in the "file" field');
  }

  return success({
    filename: file.name,
    contentType: file.type,
    body: new Uint8Array(await file.arrayBuffer()),
  });
}
