// src/core/auth/types.ts

import { z } from 'zod';

/**
 * OAuth2 token pair held by an {@link OAuth2Client}.
 * `expires_at` is a Unix timestamp in seconds.
 */
export interface Token {
  access_token: string;
  refresh_token: string;
  token_type: string;
  expires_at?: number;
}

// Accepts either expires_at or expires_in, as persisted by callers or sent by the token endpoint
export const TokenInputSchema = z
  .object({
    access_token: z.string().min(1, 'access_token must not be empty'),
    refresh_token: z.string().min(1, 'refresh_token must not be empty'),
    token_type: z.string().min(1).default('bearer'),
    expires_at: z.number().int().nonnegative().optional(),
    expires_in: z.number().int().nonnegative().optional(),
  })
  .passthrough()
  .transform((input): Token => {
    const token: Token = {
      access_token: input.access_token,
      refresh_token: input.refresh_token,
      token_type: input.token_type,
    };
    if (input.expires_at !== undefined) {
      token.expires_at = input.expires_at;
    } else if (input.expires_in !== undefined) {
      token.expires_at = Math.floor(Date.now() / 1000) + input.expires_in;
    }
    return token;
  });

export type TokenInput = z.input<typeof TokenInputSchema>;

export type AuthState = 'unauthenticated' | 'authenticated';

export type GrantType = 'authorization_code' | 'refresh_token';

export interface OAuth2Config {
  clientId: string;
  clientSecret: string;
  redirectUri?: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  timeout?: number;
}
