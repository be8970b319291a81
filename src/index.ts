// src/index.ts
import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { SupabaseRunStore } from './publish.js';
import { getClient } from './supabase.js';

const config = loadConfig();
const store = config.supabase ? new SupabaseRunStore(getClient(config)) : null;

const app = createApp({ config, store });

app.listen(config.port, () => {
  console.log(`Campus energy API listening on :${config.port}`);
  if (!store) console.log('Supabase not configured: publishing disabled');
});
