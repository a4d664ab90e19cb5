// tests/helpers/fixtures.ts

import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import type { ZenMoneyConfig } from '../../src/config/ConfigValidator';

export const API_ORIGIN = 'https://api.zenmoney.ru';
export const TOKEN_PATH = '/oauth2/token/';
export const DIFF_PATH = '/v8/diff/';
export const SUGGEST_PATH = '/v8/suggest/';

export const CLIENT_ID = 'test-client-id';
export const CLIENT_SECRET = 'test-client-secret';
export const REDIRECT_URI = 'http://localhost:8080/callback';

// 2025-01-01T12:00:00Z
export const NOW = 1735732800;

export const BASIC_AUTH = `Basic ${Buffer.from(`${CLIENT_ID}:${CLIENT_SECRET}`).toString('base64')}`;

export function silentLogger(): Logger {
  return new Logger({ silent: true });
}

export function testMetrics(): MetricsCollector {
  return new MetricsCollector();
}

export function testConfig(overrides: Partial<ZenMoneyConfig> = {}): ZenMoneyConfig {
  return {
    clientId: CLIENT_ID,
    clientSecret: CLIENT_SECRET,
    redirectUri: REDIRECT_URI,
    logging: { silent: true },
    ...overrides,
  };
}

export function storedToken(suffix = '1') {
  return {
    access_token: `test-access-${suffix}`,
    refresh_token: `test-refresh-${suffix}`,
    token_type: 'bearer',
    expires_at: NOW + 86400,
  };
}

export function tokenResponse(suffix: string) {
  return {
    access_token: `test-access-${suffix}`,
    refresh_token: `test-refresh-${suffix}`,
    token_type: 'bearer',
    expires_in: 86400,
  };
}

export function sampleTransaction() {
  return {
    id: '7c1a8f2e-5d4b-4e31-9a77-0d2b6c1f0001',
    changed: NOW,
    created: NOW,
    user: 123,
    deleted: false,
    incomeInstrument: 2,
    incomeAccount: 'acc-wallet',
    income: 0,
    outcomeInstrument: 2,
    outcomeAccount: 'acc-wallet',
    outcome: 250.5,
    tag: ['tag-food'],
    merchant: null,
    payee: 'Corner Coffee',
    originalPayee: 'CORNER COFFEE 42',
    comment: null,
    date: '2025-01-01',
    mcc: 5814,
  };
}

export function sampleAccount() {
  return {
    id: 'acc-wallet',
    changed: NOW,
    user: 123,
    role: null,
    title: 'Wallet',
    type: 'cash',
    instrument: 2,
    company: null,
    syncID: null,
    balance: 1000,
    startBalance: 0,
    creditLimit: 0,
    inBalance: true,
    enableCorrection: false,
    enableSMS: false,
    archive: false,
    private: false,
    savings: false,
    capitalization: null,
    percent: null,
    startDate: null,
    endDateOffset: null,
    endDateOffsetInterval: null,
    payoffStep: null,
    payoffInterval: null,
  };
}

export function sampleDiffResponse() {
  return {
    serverTimestamp: NOW + 100,
    instrument: [
      { id: 2, changed: NOW, title: 'Test Ruble', shortTitle: 'RUB', symbol: 'R', rate: 1 },
    ],
    user: [{ id: 123, changed: NOW, login: 'test-user', currency: 2, parent: null }],
    account: [sampleAccount()],
    transaction: [sampleTransaction()],
    deletion: [],
  };
}
