import { z } from "zod";

export const SUCCESS_RESULT_CODE = "S0000";

export const ResultHeaderSchema = z.object({
  resultCode: z.string(),
  resultMessage: z.string().optional()
});

export type ResultHeader = z.infer<typeof ResultHeaderSchema>;

/**
 * Every business endpoint answers `{ header, payload }`. Some gateway routes
 * answer a bare object instead, which callers treat as the payload itself.
 */
export const ResponseEnvelopeSchema = z.object({
  header: ResultHeaderSchema,
  payload: z.unknown().optional()
});

export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

export interface UnwrappedBody {
  resultCode?: string;
  resultMessage?: string;
  payload: unknown;
}

export function unwrapEnvelope(body: unknown): UnwrappedBody {
  const parsed = ResponseEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    return { payload: body };
  }
  return {
    resultCode: parsed.data.header.resultCode,
    resultMessage: parsed.data.header.resultMessage,
    payload: parsed.data.payload ?? {}
  };
}

export function isSuccessResult(body: UnwrappedBody): boolean {
  return body.resultCode === undefined || body.resultCode === SUCCESS_RESULT_CODE;
}
