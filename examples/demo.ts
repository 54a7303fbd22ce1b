#!/usr/bin/env npx tsx
/**
 * Interactive connection engine demo
 *
 * Creates a device profile on first run, connects to the server it names
 * and prints every engine event.
 *
 * Run with:
 *   npm run demo -- --init https://chat.example.test <server-static-hex>
 *   npm run demo
 */

import * as readline from 'readline';
import {
  FileProfileStore,
  createEngine,
  createProfile,
  describeKeys,
  frameTypeName,
  generateDeviceId,
  generateDeviceKeyPair,
  type ClientEvent,
  type Frame,
} from '../src/index.js';

const store = new FileProfileStore();

function describeFrame(frame: Frame): string {
  const payload = frame.payload.kind === 'control'
    ? JSON.stringify(frame.payload.properties)
    : `${frame.payload.bytes.length} bytes`;
  return `${frameTypeName(frame.frameType)} ch=${frame.channelId} seq=${frame.sequence} ${payload}`;
}

function printEvent(event: ClientEvent): void {
  switch (event.kind) {
    case 'connected':
      console.log(`\n   Connected (session ${event.sessionId})`);
      if (event.pairingRequired) {
        console.log('   This device must be approved before it gets full access');
      }
      break;
    case 'disconnected':
      console.log(`\n   Disconnected: ${event.reason}`);
      break;
    case 'frame':
      console.log(`\n   <- ${describeFrame(event.frame)}`);
      break;
    case 'error':
      console.error(`\n   Error: ${event.detail}`);
      break;
    case 'log':
      console.log(`   ${event.line}`);
      break;
  }
}

async function init(serverUrl: string, serverStatic: string | undefined) {
  const keys = generateDeviceKeyPair();
  const deviceId = generateDeviceId('device');
  const profile = createProfile({
    deviceId,
    serverUrl,
    domain: new URL(serverUrl).hostname,
    keys,
    serverStatic,
  });
  await store.save(profile);

  console.log(`\nProfile written to ${store.filePath}\n`);
  console.log(describeKeys(deviceId, keys));
}

async function main() {
  const profile = await store.load();
  if (!profile) {
    console.error(`No profile at ${store.filePath}; run with --init <server-url> <server-static-hex>`);
    process.exit(1);
  }

  const engine = createEngine({ profileStore: store });

  const pump = (async () => {
    for await (const event of engine.events) {
      printEvent(event);
      process.stdout.write('> ');
    }
  })();

  const printHelp = () => {
    console.log('\nCommands:');
    console.log('   /connect              - Connect with the stored profile');
    console.log('   /disconnect           - Close the connection');
    console.log('   /join <ch> [members]  - Join a channel');
    console.log('   /leave <ch>           - Leave a channel');
    console.log('   /presence <state>     - Announce presence');
    console.log('   /quit                 - Exit demo');
    console.log('   <ch> <message>        - Send a message on a channel\n');
  };

  printHelp();
  engine.handle.connect(profile);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  rl.on('line', (input) => {
    const trimmed = input.trim();
    if (!trimmed) return;

    const [command, ...rest] = trimmed.split(/\s+/);
    try {
      if (command === '/connect') {
        engine.handle.connect(profile);
      } else if (command === '/disconnect') {
        engine.handle.disconnect();
      } else if (command === '/join') {
        engine.handle.join(Number(rest[0]), rest.slice(1));
      } else if (command === '/leave') {
        engine.handle.leave(Number(rest[0]));
      } else if (command === '/presence') {
        engine.handle.presence(rest[0] ?? profile.presenceState);
      } else if (command === '/quit' || command === '/exit') {
        rl.close();
      } else if (command.startsWith('/')) {
        console.log(`\n   Unknown command: ${command}`);
        printHelp();
      } else {
        const channelId = Number(command);
        if (!Number.isSafeInteger(channelId)) {
          console.log('\n   Usage: <ch> <message>');
          return;
        }
        engine.handle.sendMessage(channelId, new TextEncoder().encode(rest.join(' ')));
      }
    } catch (error) {
      console.error(`\n   Error: ${error instanceof Error ? error.message : error}`);
    }
  });

  rl.on('close', () => {
    engine.handle.close();
  });

  await engine.done;
  await pump;
  await store.close();
  console.log('\n   Goodbye!\n');
}

const args = process.argv.slice(2);
if (args[0] === '--init') {
  if (!args[1]) {
    console.error('Usage: demo --init <server-url> [server-static-hex]');
    process.exit(1);
  }
  init(args[1], args[2]).catch(console.error);
} else {
  main().catch(console.error);
}
