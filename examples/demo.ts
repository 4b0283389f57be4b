#!/usr/bin/env npx tsx
/**
 * Local chat archive browser
 *
 * Decrypts the desktop client's archive into a temporary copy and lets
 * you browse it interactively. The copy is deleted on exit.
 *
 * Run with: npm run demo
 * Set CHAT_ARCHIVE_CONTAINER to point at a different container directory.
 */

import * as readline from 'readline';
import { ChatStore, ArchiveError } from '../src/index.js';

const formatTime = (seconds: number) =>
  new Date(seconds * 1000).toISOString().replace('T', ' ').slice(0, 19);

function main() {
  const store = new ChatStore();

  if (!store.available) {
    console.error('Chat archive not found. Is the desktop client installed and logged in?');
    process.exit(1);
  }

  const printHelp = () => {
    console.log('\nCommands:');
    console.log('   /recent [n]         - List recent chats');
    console.log('   /find <query>       - Find chats by name, username or phone');
    console.log('   /read <who> [n]     - Read a chat (peer id, phone or name)');
    console.log('   /search <query>     - Search message text');
    console.log('   /stats              - Show archive statistics');
    console.log('   /quit               - Exit\n');
  };

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const prompt = () => process.stdout.write('\n> ');

  const run = (line: string) => {
    const [command, ...rest] = line.split(/\s+/);
    const arg = rest.join(' ');

    switch (command) {
      case '/recent': {
        for (const chat of store.recentChats(Number(arg) || 20)) {
          console.log(`   ${formatTime(chat.lastMessageTimestamp)}  ${chat.name}  (${chat.peerId})`);
        }
        break;
      }
      case '/find': {
        const matches = store.findChats(arg);
        if (matches.length === 0) console.log('   No chats found.');
        for (const chat of matches) {
          console.log(`   ${chat.name}  @${chat.username || '-'}  ${chat.phone || '-'}  (${chat.peerId})`);
        }
        break;
      }
      case '/read': {
        const hasLimit = rest.length > 1 && /^\d{1,4}$/.test(rest[rest.length - 1]);
        const who = hasLimit ? rest.slice(0, -1).join(' ') : arg;
        const limit = hasLimit ? Number(rest[rest.length - 1]) : 20;
        const peerId = store.resolveIdentifier(who);
        if (peerId === null) {
          console.log(`   No chat matches "${who}".`);
          break;
        }
        for (const message of store.readMessages(peerId, limit).reverse()) {
          console.log(`   [${formatTime(message.timestamp)}] ${message.sender}: ${message.text}`);
        }
        break;
      }
      case '/search': {
        const hits = store.searchMessages(arg);
        if (hits.length === 0) console.log('   No messages found.');
        for (const hit of hits) {
          console.log(`   [${formatTime(hit.timestamp)}] ${hit.chatName} / ${hit.sender}: ${hit.text}`);
        }
        break;
      }
      case '/stats': {
        const stats = store.stats();
        console.log(`   ${stats.messages} messages, ${stats.peers} peers`);
        break;
      }
      case '/quit':
        rl.close();
        return;
      default:
        printHelp();
    }
    prompt();
  };

  rl.on('line', (input) => {
    const trimmed = input.trim();
    if (!trimmed) {
      prompt();
      return;
    }

    try {
      run(trimmed);
    } catch (error) {
      if (error instanceof ArchiveError) {
        console.error(`\n   ${error.name}: ${error.message}`);
        rl.close();
        return;
      }
      throw error;
    }
  });

  rl.on('close', () => {
    store.close();
    console.log('\nDecrypted copy removed. Goodbye!');
    process.exit(0);
  });

  printHelp();
  prompt();
}

main();
