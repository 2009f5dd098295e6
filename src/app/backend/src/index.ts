import 'dotenv/config';
import { KelPublisher, KeriaStateLoader, type LocationBook } from '@did-webs/node';
import { createApp } from './app.js';
import { getEnvConfig, loadLocationBook } from './services/config.js';
import { DidWebsService } from './services/did-webs.js';
import { createClientProvider } from './services/signify.js';

const env = getEnvConfig();

async function start() {
  console.log('Starting did:webs resolver...');

  let locations: LocationBook = {};
  if (env.locationsPath) {
    locations = loadLocationBook(env.locationsPath);
    console.log(`Location book loaded: ${Object.keys(locations).length} endpoints`);
  } else {
    console.warn('No LOCATIONS_PATH set; documents will carry no service endpoints.');
  }

  console.log('Environment:');
  console.log(`  Port: ${env.port}`);
  console.log(`  KERIA URL: ${env.keriaUrl}`);
  console.log(`  KERIA HTTP URL: ${env.keriaHttpUrl}`);
  console.log(`  DID path: /${env.didPath}`);
  console.log(`  Local identities: ${env.keriaPasscode ? 'from agent' : 'none (set KERIA_PASSCODE to enable)'}`);

  const getClient = createClientProvider({
    keriaUrl: env.keriaUrl,
    keriaBootUrl: env.keriaBootUrl,
    passcode: env.keriaPasscode,
  });
  const loader = new KeriaStateLoader(
    {
      keriaHttpUrl: env.keriaHttpUrl,
      locations,
      designatedAliasesSchema: env.designatedAliasesSchema,
    },
    getClient,
  );

  const app = createApp({
    service: new DidWebsService(loader, { designatedAliasesSchema: env.designatedAliasesSchema }),
    kel: new KelPublisher({ keriaHttpUrl: env.keriaHttpUrl }, loader),
    didPath: env.didPath,
  });

  app.listen(env.port, () => {
    console.log(`[server] Server running on port ${env.port}`);
  });
}

start().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
