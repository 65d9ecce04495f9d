import { readFile } from "node:fs/promises";
import path from "node:path";

import { ENDPOINTS, UPLOAD_HEADERS } from "./constants.js";
import { APIError } from "./errors.js";
import type { Attachment } from "./request-codec.js";
import type { Transport } from "./transport.js";

/** Pushes a local file to the service and returns the opaque reference a prompt can attach. */
export type FileUploader = (filePath: string, transport: Transport, timeoutMs?: number) => Promise<string>;

export const uploadFile: FileUploader = async (filePath, transport, timeoutMs) => {
  const bytes = await readFile(filePath);
  const form = new FormData();
  form.append("file", new Blob([new Uint8Array(bytes)]), path.basename(filePath));

  const response = await transport.request({
    method: "POST",
    url: ENDPOINTS.upload,
    headers: UPLOAD_HEADERS,
    multipart: form,
    timeoutMs,
  });

  if (response.status !== 200 || !response.text.trim()) {
    throw new APIError(`file_upload_failed_${response.status}: ${path.basename(filePath)}`);
  }

  return response.text.trim();
};

export async function uploadAttachments(
  files: readonly string[],
  transport: Transport,
  uploader: FileUploader,
  timeoutMs?: number,
): Promise<Attachment[]> {
  const attachments: Attachment[] = [];
  for (const file of files) {
    attachments.push({
      uploadRef: await uploader(file, transport, timeoutMs),
      fileName: path.basename(file),
    });
  }
  return attachments;
}
