/**
 * Uploader
 *
 * Pushes the rendered PNG to the remote upload endpoint with a fresh signed
 * token per attempt. Auth and format rejections fail at once; network errors,
 * timeouts and 5xx responses are retried with exponential backoff.
 */

import { createAuthorizationHeader, UploadAuthError, UploadTransportError, type Frame } from "@paperday/core";
import { encodePng } from "@paperday/rendering";
import { createBackoff, sleep } from "./backoff.js";

export const UPLOAD_FILE_NAME = "timeline.png";

export interface UploaderOptions {
  serverUrl: string;
  apiKey: string;
  timeoutMs: number;
  /** Total attempts, the first included */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
}

export interface UploadResult {
  status: string;
  file?: string;
}

interface ResponseBody {
  status?: string;
  file?: string;
  error?: string;
}

async function readResponseBody(response: Response): Promise<ResponseBody> {
  const text = await response.text();
  try {
    const json: unknown = JSON.parse(text);
    if (typeof json !== "object" || json === null) return {};
    const body: ResponseBody = {};
    if ("status" in json && typeof json.status === "string") body.status = json.status;
    if ("file" in json && typeof json.file === "string") body.file = json.file;
    if ("error" in json && typeof json.error === "string") body.error = json.error;
    return body;
  } catch {
    // Not JSON; the status code alone decides
    return {};
  }
}

function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

export class Uploader {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: UploaderOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  async upload(frame: Frame, note?: string): Promise<UploadResult> {
    return this.uploadPng(await encodePng(frame), note);
  }

  async uploadPng(png: Uint8Array, note?: string): Promise<UploadResult> {
    const backoff = createBackoff({
      initialDelay: this.options.initialDelayMs,
      maxDelay: this.options.maxDelayMs,
      maxRetries: this.options.maxAttempts - 1,
    });

    for (;;) {
      try {
        const result = await this.attempt(png, note);
        console.log(`[upload] Upload successful${result.file ? `: ${result.file}` : ""}`);
        return result;
      } catch (error) {
        if (!(error instanceof UploadTransportError)) throw error;

        const step = backoff.next();
        if (step.exhausted) throw error;
        console.warn(
          `[upload] Attempt ${step.retry + 1}/${this.options.maxAttempts} failed, retrying in ${step.delay}ms:`,
          error.message
        );
        await this.sleep(step.delay);
      }
    }
  }

  private async attempt(png: Uint8Array, note: string | undefined): Promise<UploadResult> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(png)], { type: "image/png" }), UPLOAD_FILE_NAME);
    if (note) form.append("note", note);

    let response: Response;
    try {
      response = await fetch(this.options.serverUrl, {
        method: "POST",
        headers: { Authorization: createAuthorizationHeader(this.options.apiKey) },
        body: form,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new UploadTransportError(
        `Upload request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const body = await readResponseBody(response);
    if (response.ok) {
      return { status: body.status ?? "success", file: body.file };
    }

    const detail = body.error ?? (response.statusText || "Unknown error");
    if (isRetryableStatus(response.status)) {
      throw new UploadTransportError(`Upload failed (${response.status}): ${detail}`, { status: response.status });
    }
    throw new UploadAuthError(response.status, `Upload rejected (${response.status}): ${detail}`);
  }
}
