#!/usr/bin/env node
import * as readline from 'readline';
import { advance } from './graph/graph';
import { createSession } from './graph/state';
import { formatValue } from './services/guidance.service';
import { SessionState } from './types/graph';

async function initCLI() {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  let session: SessionState = createSession();

  console.log('\n📝 Form Pilot - conversational form assistant\n');
  console.log('Answer the questions, or type "restart" to start over and "exit" to quit\n');
  console.log(`🤖 ${session.messages[0].text}\n`);

  const askQuestion = () => {
    rl.question('You > ', async (input) => {
      const text = input.trim();

      if (text.toLowerCase() === 'exit') {
        console.log('\nGoodbye! 👋\n');
        rl.close();
        return;
      }

      if (text.toLowerCase() === 'restart') {
        session = createSession();
        console.log(`\n🤖 ${session.messages[0].text}\n`);
        askQuestion();
        return;
      }

      const result = await advance(session, text);
      session = result.session;

      if (result.reply) {
        console.log(`\n🤖 ${result.reply}\n`);
      }

      if (session.complete && session.finalOutput) {
        console.log('━'.repeat(80));
        console.log('📋 FORM DATA:\n');
        for (const [field, value] of Object.entries(session.finalOutput)) {
          console.log(`  ${field}: ${formatValue(value)}`);
        }
        console.log('━'.repeat(80));
        console.log(JSON.stringify(session.finalOutput, null, 2));
        rl.close();
        return;
      }

      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch(console.error);
}
