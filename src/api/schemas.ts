// src/api/schemas.ts

import { z } from 'zod';

export const SessionSchema = z
  .object({
    user_id: z.string(),
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    public_token: z.string().optional(),
    enctoken: z.string().optional(),
    login_time: z.string().optional(),
  })
  .passthrough();

export type Session = z.infer<typeof SessionSchema>;

export const TokenRenewalSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
  })
  .passthrough();

export type TokenRenewal = z.infer<typeof TokenRenewalSchema>;

export const OrderIdSchema = z.object({ order_id: z.string() });

export const SipIdSchema = z.object({ sip_id: z.string() });

export const TriggerIdSchema = z.object({ trigger_id: z.number() });

export const FlagSchema = z.boolean();

export const CsvSchema = z.string();
