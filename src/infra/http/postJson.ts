import { z } from "zod";
import { errorMessage, ProviderError } from "../../domain/errors.js";

export interface PostJsonOptions {
  providerName: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

const MAX_ERROR_BODY_CHARS = 300;

/**
 * POSTs a JSON body and validates the JSON reply against `schema`.
 *
 * @throws ProviderError on network failure, non-2xx status or an unexpected reply shape
 */
export async function postJson<S extends z.ZodTypeAny>(
  url: string,
  body: unknown,
  schema: S,
  options: PostJsonOptions,
): Promise<z.infer<S>> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw error;
    }
    throw new ProviderError(options.providerName, undefined, errorMessage(error), { cause: error });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new ProviderError(
      options.providerName,
      response.status,
      text.slice(0, MAX_ERROR_BODY_CHARS) || response.statusText,
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new ProviderError(options.providerName, response.status, "response is not valid JSON", {
      cause: error,
    });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ProviderError(
      options.providerName,
      response.status,
      `unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
