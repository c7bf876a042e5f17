import { ApplicationBootstrap } from './bootstrap';
import { ApplicationServer } from './server';

async function main(): Promise<void> {
  const server = new ApplicationServer(new ApplicationBootstrap());
  await server.start();
}

if (require.main === module) {
  main().catch(error => {
    console.error('Failed to start application:', error);
    process.exit(1);
  });
}

export { main };
