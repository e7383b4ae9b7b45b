/**
 * Trigger Sync Script
 *
 * Publishes a sync trigger event for one provider account, every account of
 * a provider, or every registered pipeline.
 *
 * Usage: npm run trigger-sync -- [provider] [account]  (after npm run build)
 */
import { v4 as uuidv4 } from 'uuid';
import { BrokerAdapter } from '../src/broker/adapter';
import Config from '../src/config';
import { SyncTrigger } from '../src/types/events';
import { validateSyncTriggerMessage } from '../src/utils/schema-validator';

async function main(): Promise<void> {
  const [provider, account] = process.argv.slice(2);

  const trigger: SyncTrigger = validateSyncTriggerMessage({
    event_id: uuidv4(),
    ...(provider ? { provider } : {}),
    ...(account ? { account } : {}),
    timestamp: new Date().toISOString(),
  });

  console.log('Connecting to message broker...');
  const broker = await BrokerAdapter.connect({ url: Config.broker.url });

  const target = provider ? `${provider}${account ? `/${account}` : ' (all accounts)'}` : 'all pipelines';
  console.log(`Publishing sync trigger for ${target}`);
  await broker.publish(Config.topics.in.syncTrigger, trigger);

  await broker.close();
  console.log('Done.');
}

// Execute if run directly
if (require.main === module) {
  main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
