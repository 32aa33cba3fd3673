import { z } from 'zod';
import { StageError, errorMessage } from '../lib/errors.js';
import type { ServiceEndpoint } from '../lib/config.js';

const toolEnvelopeSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
});

const MAX_ERROR_BODY_CHARS = 500;

/**
 * JSON client for a remote tool service: `POST {baseUrl}/tools/{tool}` with
 * the arguments as body, answered by `{ success, error?, ...result }`.
 * Every failure mode surfaces as StageError.
 */
export class ToolServiceClient {
  constructor(
    readonly serviceName: string,
    private readonly endpoint: ServiceEndpoint,
  ) {}

  async call<T extends z.ZodTypeAny>(
    tool: string,
    args: Record<string, unknown>,
    resultSchema: T,
  ): Promise<z.output<T>> {
    const url = `${this.endpoint.baseUrl}/tools/${tool}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.endpoint.apiKey ? { Authorization: `Bearer ${this.endpoint.apiKey}` } : {}),
        },
        body: JSON.stringify(args),
      });
    } catch (err) {
      throw new StageError(`${this.serviceName} service unreachable: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      const body = (await response.text().catch(() => '')).trim();
      throw new StageError(
        `${this.serviceName} service error (${response.status})${body ? `: ${body.slice(0, MAX_ERROR_BODY_CHARS)}` : ''}`,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new StageError(`${this.serviceName} service returned invalid JSON`);
    }

    const envelope = toolEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new StageError(`${this.serviceName} service returned an unexpected response`);
    }
    if (!envelope.data.success) {
      throw new StageError(envelope.data.error || `${tool} failed`);
    }

    const result = resultSchema.safeParse(payload);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new StageError(`${tool} returned an invalid result${issue ? ` (${issue.path.join('.')}: ${issue.message})` : ''}`);
    }
    return result.data;
  }
}
