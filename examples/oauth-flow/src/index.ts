import express from 'express';
import crypto from 'crypto';
import { ZenMoneyClient, loadConfigFromEnv, SDKError } from '../../../src/index';

// Reads ZENMONEY_CLIENT_ID, ZENMONEY_CLIENT_SECRET and ZENMONEY_REDIRECT_URI (.env supported)
const config = loadConfigFromEnv();
const client = ZenMoneyClient.create({ ...config, logging: { level: 'debug', format: 'pretty' } });

const app = express();
const PORT = Number(process.env.PORT || 8080);

// One pending state per process is enough for a single-user demo
let pendingState: string | undefined;

function sendError(res: express.Response, error: unknown): void {
  if (error instanceof SDKError) {
    res.status(502).json({ error: error.message, code: error.code, details: error.details });
    return;
  }
  res.status(500).json({ error: error instanceof Error ? error.message : String(error) });
}

app.get('/', (_req, res) => {
  pendingState = crypto.randomBytes(16).toString('hex');
  res.redirect(client.auth.authorizationUrl(pendingState));
});

app.get('/callback', async (req, res) => {
  const { code, state } = req.query;

  if (typeof code !== 'string' || state !== pendingState) {
    res.status(400).json({ error: 'Missing code or state mismatch' });
    return;
  }
  pendingState = undefined;

  try {
    await client.auth.fetchToken(code);
    res.redirect('/diff');
  } catch (error: unknown) {
    sendError(res, error);
  }
});

app.get('/diff', async (_req, res) => {
  try {
    const diff = await client.getDiff();
    res.json({
      serverTimestamp: diff.serverTimestamp,
      accounts: diff.account?.length ?? 0,
      transactions: diff.transaction?.length ?? 0,
    });
  } catch (error: unknown) {
    sendError(res, error);
  }
});

app.get('/suggest', async (req, res) => {
  const payee = typeof req.query.payee === 'string' ? req.query.payee : 'McDonalds';
  try {
    res.json(await client.suggest({ payee }));
  } catch (error: unknown) {
    sendError(res, error);
  }
});

// The caller owns persistence: this shows the token a real app would store
app.get('/token', (_req, res) => {
  const token = client.auth.getToken();
  res.json(token ? { token_type: token.token_type, expires_at: token.expires_at } : { state: 'unauthenticated' });
});

app.get('/metrics', async (_req, res) => {
  res.type('text/plain');
  res.send(await client.getMetrics());
});

app.listen(PORT, () => {
  console.log(`Open http://localhost:${PORT}/ to authorize with ZenMoney`);
});
