import path from 'path';
import FormData from 'form-data';
import type { SubmissionRequest } from '../../core/entities/Job.js';
import type { ClassifiedAttachment } from '../../core/interfaces/IVideoClient.js';

export interface EncodedBody {
  body: FormData | string;
  headers: Record<string, string>;
}

export const INPUT_REFERENCE_FIELD = 'input_reference';

function appendIfPresent(form: FormData, field: string, value: string | undefined): void {
  // the service tells an absent field from an empty one, so empty values are omitted
  if (value !== undefined && value !== '') {
    form.append(field, value);
  }
}

/**
 * Multipart body for a new generation job
 */
export async function encodeCreateRequest(
  request: SubmissionRequest,
  attachment?: ClassifiedAttachment
): Promise<EncodedBody> {
  const form = new FormData();
  form.append('prompt', request.prompt);
  appendIfPresent(form, 'model', request.model);
  appendIfPresent(form, 'seconds', request.seconds === undefined ? undefined : String(Math.trunc(request.seconds)));
  appendIfPresent(form, 'size', request.size);

  if (attachment) {
    const { source, contentType } = attachment;
    await source.rewind();
    form.append(INPUT_REFERENCE_FIELD, source.stream(), {
      filename: path.basename(source.name),
      contentType,
      knownLength: source.size,
    });
  }

  return {
    body: form,
    headers: form.getHeaders(),
  };
}

/**
 * JSON body for a remix job
 */
export function encodeRemixRequest(prompt: string): EncodedBody {
  return {
    body: JSON.stringify({ prompt }),
    headers: { 'Content-Type': 'application/json' },
  };
}
