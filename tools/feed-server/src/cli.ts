import { PathwatchError } from 'pathwatch';
import { loadBotConfig } from 'pathwatch-bot';
import { createFeedServer } from './server.js';

function parseArgs(): { port: number } {
  const args = process.argv.slice(2);
  let port = Number(process.env.PORT) || 3002;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--port' && args[i + 1]) {
      port = Number(args[i + 1]);
      i++;
    } else if (args[i] === '--help') {
      console.log('Usage: pathwatch-feed [--port <port>]');
      console.log('Bot settings are read from PATHWATCH_* environment variables.');
      process.exit(0);
    }
  }

  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new PathwatchError('INVALID_CONFIG', `Invalid port: ${port}`);
  }
  return { port };
}

function main(): void {
  const { port } = parseArgs();
  const server = createFeedServer({ port, botOptions: { config: loadBotConfig(process.env) } });

  server.bot.onStatus((status, detail) => {
    console.log(`[pathwatch] ${status}${detail ? ` ${detail}` : ''}`);
  });

  server.listening
    .then(() => {
      console.log(`pathwatch feed server running on ws://localhost:${port}`);
    })
    .catch((err: unknown) => {
      console.error('Failed to start feed server:', err);
      process.exit(1);
    });

  process.on('SIGINT', () => {
    server.close();
    process.exit(0);
  });
}

try {
  main();
} catch (err) {
  console.error(err instanceof PathwatchError ? `${err.code}: ${err.message}` : err);
  process.exit(1);
}
