// src/core/models/types.ts

import type { z } from 'zod';
import type {
  InstrumentSchema,
  CompanySchema,
  UserSchema,
  AccountSchema,
  AccountTypeSchema,
  TagSchema,
  MerchantSchema,
  ReminderSchema,
  ReminderMarkerSchema,
  ReminderMarkerStateSchema,
  TransactionSchema,
  BudgetSchema,
  DeletionSchema,
  EntityKindSchema,
  LocalChangesSchema,
  DiffResponseSchema,
  SuggestRequestSchema,
  SuggestResponseSchema,
} from './schemas';

export type Instrument = z.output<typeof InstrumentSchema>;
export type Company = z.output<typeof CompanySchema>;
export type User = z.output<typeof UserSchema>;
export type AccountType = z.output<typeof AccountTypeSchema>;
export type Account = z.output<typeof AccountSchema>;
export type Tag = z.output<typeof TagSchema>;
export type Merchant = z.output<typeof MerchantSchema>;
export type Reminder = z.output<typeof ReminderSchema>;
export type ReminderMarkerState = z.output<typeof ReminderMarkerStateSchema>;
export type ReminderMarker = z.output<typeof ReminderMarkerSchema>;
export type Transaction = z.output<typeof TransactionSchema>;
export type Budget = z.output<typeof BudgetSchema>;
export type Deletion = z.output<typeof DeletionSchema>;

export type EntityKind = z.output<typeof EntityKindSchema>;

/**
 * Local changes sent to the diff endpoint. `currentClientTimestamp` is filled
 * with the current time when omitted; leave `serverTimestamp` out for a full pull.
 */
export type DiffPayload = z.input<typeof LocalChangesSchema>;

export type DiffResponse = z.output<typeof DiffResponseSchema>;

export type SuggestRequest = z.input<typeof SuggestRequestSchema>;
export type SuggestResponse = z.output<typeof SuggestResponseSchema>;
