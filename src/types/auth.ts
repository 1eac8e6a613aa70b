import { z } from 'zod';

/**
 * Token endpoint response (`POST /authentication/v1/token`)
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.string().min(1),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * 目前持有的 Bearer Token
 */
export interface Credential {
  accessToken: string;
  expiresAt: number; // Unix timestamp (ms)
}
