import { z } from "zod";

export const TokenPayloadSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiresIn: z.number().int().positive().optional()
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

export interface DeviceIdentity {
  deviceId: string;
  clientId: string;
  installId: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken?: string;
  /** Epoch milliseconds. */
  expiresAt: number;
}

export type AuthState = "unauthenticated" | "authenticating" | "authenticated" | "refreshing" | "logged-out";
