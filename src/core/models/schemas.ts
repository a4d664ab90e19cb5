// src/core/models/schemas.ts

import { z } from 'zod';

// Unix timestamp in seconds
const timestamp = z.number().int().nonnegative();
// yyyy-MM-dd
const date = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected date as yyyy-MM-dd');
const uuid = z.string().min(1);
const userId = z.number().int();
const instrumentId = z.number().int();
const amount = z.number();

// System entities: read-only for API users, integer ids

export const InstrumentSchema = z
  .object({
    id: instrumentId,
    changed: timestamp,
    title: z.string(),
    shortTitle: z.string(),
    symbol: z.string(),
    rate: z.number(),
  })
  .passthrough();

export const CompanySchema = z
  .object({
    id: z.number().int(),
    changed: timestamp,
    title: z.string(),
    fullTitle: z.string().nullable().optional(),
    www: z.string().nullable().optional(),
    country: z.union([z.string(), z.number().int()]).nullable().optional(),
  })
  .passthrough();

export const UserSchema = z
  .object({
    id: userId,
    changed: timestamp,
    login: z.string().nullable().optional(),
    currency: instrumentId,
    parent: userId.nullable().optional(),
  })
  .passthrough();

// User entities: created, updated and deleted by API users, uuid ids

export const AccountTypeSchema = z.enum([
  'cash',
  'ccard',
  'checking',
  'loan',
  'deposit',
  'emoney',
  'debt',
]);

export const AccountSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    user: userId,
    role: userId.nullable().optional(),
    title: z.string(),
    type: AccountTypeSchema,
    instrument: instrumentId.nullable(),
    company: z.number().int().nullable(),
    syncID: z.array(z.string()).nullable(),
    balance: amount.nullable(),
    startBalance: amount.nullable(),
    creditLimit: amount.nullable().optional(),
    inBalance: z.boolean(),
    enableCorrection: z.boolean(),
    enableSMS: z.boolean(),
    archive: z.boolean(),
    private: z.boolean(),
    savings: z.boolean().nullable().optional(),
    // Loan and deposit terms; null for other account types
    capitalization: z.boolean().nullable().optional(),
    percent: z.number().nullable().optional(),
    startDate: date.nullable().optional(),
    endDateOffset: z.number().int().nullable().optional(),
    endDateOffsetInterval: z.enum(['day', 'week', 'month', 'year']).nullable().optional(),
    payoffStep: z.number().int().nullable().optional(),
    payoffInterval: z.enum(['month', 'year']).nullable().optional(),
  })
  .passthrough();

export const TagSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    user: userId,
    title: z.string(),
    parent: uuid.nullable().optional(),
    icon: z.string().nullable().optional(),
    picture: z.string().nullable().optional(),
    color: z.number().int().nullable().optional(),
    showIncome: z.boolean(),
    showOutcome: z.boolean(),
    budgetIncome: z.boolean(),
    budgetOutcome: z.boolean(),
    required: z.boolean().nullable().optional(),
  })
  .passthrough();

export const MerchantSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    user: userId,
    title: z.string(),
  })
  .passthrough();

// Money movement shared by Reminder, ReminderMarker and Transaction
const moneyMovement = {
  incomeInstrument: instrumentId,
  incomeAccount: uuid,
  income: amount,
  outcomeInstrument: instrumentId,
  outcomeAccount: uuid,
  outcome: amount,
  tag: z.array(uuid).nullable().optional(),
  merchant: uuid.nullable().optional(),
  payee: z.string().nullable().optional(),
  comment: z.string().nullable().optional(),
};

export const ReminderSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    user: userId,
    ...moneyMovement,
    interval: z.enum(['day', 'week', 'month', 'year']).nullable().optional(),
    step: z.number().int().nullable().optional(),
    points: z.array(z.number().int()).nullable().optional(),
    startDate: date,
    endDate: date.nullable().optional(),
    notify: z.boolean(),
  })
  .passthrough();

export const ReminderMarkerStateSchema = z.enum(['planned', 'processed', 'deleted']);

export const ReminderMarkerSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    user: userId,
    ...moneyMovement,
    date,
    reminder: uuid,
    state: ReminderMarkerStateSchema,
    notify: z.boolean(),
  })
  .passthrough();

export const TransactionSchema = z
  .object({
    id: uuid,
    changed: timestamp,
    created: timestamp,
    user: userId,
    deleted: z.boolean().default(false),
    ...moneyMovement,
    originalPayee: z.string().nullable().optional(),
    date,
    mcc: z.number().int().nullable().optional(),
    reminderMarker: uuid.nullable().optional(),
    opIncome: amount.nullable().optional(),
    opIncomeInstrument: instrumentId.nullable().optional(),
    opOutcome: amount.nullable().optional(),
    opOutcomeInstrument: instrumentId.nullable().optional(),
    latitude: z.number().nullable().optional(),
    longitude: z.number().nullable().optional(),
  })
  .passthrough();

export const BudgetSchema = z
  .object({
    changed: timestamp,
    user: userId,
    // null is the "total" budget row across all categories
    tag: uuid.nullable(),
    date,
    income: amount,
    incomeLock: z.boolean(),
    outcome: amount,
    outcomeLock: z.boolean(),
  })
  .passthrough();

export const DeletionSchema = z
  .object({
    id: z.string(),
    object: z.string(),
    user: userId,
    stamp: timestamp,
  })
  .passthrough();

export const ENTITY_SCHEMAS = {
  instrument: InstrumentSchema,
  company: CompanySchema,
  user: UserSchema,
  account: AccountSchema,
  tag: TagSchema,
  merchant: MerchantSchema,
  reminder: ReminderSchema,
  reminderMarker: ReminderMarkerSchema,
  transaction: TransactionSchema,
  budget: BudgetSchema,
} as const;

export const EntityKindSchema = z.enum([
  'instrument',
  'company',
  'user',
  'account',
  'tag',
  'merchant',
  'reminder',
  'reminderMarker',
  'transaction',
  'budget',
]);

const entityLists = {
  instrument: z.array(InstrumentSchema).optional(),
  company: z.array(CompanySchema).optional(),
  user: z.array(UserSchema).optional(),
  account: z.array(AccountSchema).optional(),
  tag: z.array(TagSchema).optional(),
  merchant: z.array(MerchantSchema).optional(),
  reminder: z.array(ReminderSchema).optional(),
  reminderMarker: z.array(ReminderMarkerSchema).optional(),
  transaction: z.array(TransactionSchema).optional(),
  budget: z.array(BudgetSchema).optional(),
  deletion: z.array(DeletionSchema).optional(),
};

// Unknown keys (entity kinds this client does not know) pass through untouched
export const DiffPayloadSchema = z
  .object({
    currentClientTimestamp: timestamp,
    serverTimestamp: timestamp.optional(),
    forceFetch: z.array(EntityKindSchema).optional(),
    ...entityLists,
  })
  .passthrough();

// Caller-facing form of the payload; the client fills currentClientTimestamp
export const LocalChangesSchema = DiffPayloadSchema.partial({ currentClientTimestamp: true });

export const DiffResponseSchema = z
  .object({
    serverTimestamp: timestamp,
    currentClientTimestamp: timestamp.optional(),
    ...entityLists,
  })
  .passthrough();

export const SuggestRequestSchema = z
  .object({
    payee: z.string().nullable().optional(),
  })
  .passthrough();

export const SuggestResponseSchema = z
  .object({
    payee: z.string().nullable().optional(),
    merchant: uuid.nullable().optional(),
    tag: z.union([z.string(), z.array(z.string())]).nullable().optional(),
  })
  .passthrough();
