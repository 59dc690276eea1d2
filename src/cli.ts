import * as readline from 'readline';
import mongoose from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { config } from './core/config';
import { createProductionServices } from './core/container';
import { errorMessage } from './core/errors';
import { PipelineResult } from './types';

function printResult(result: PipelineResult) {
  console.log('━'.repeat(80));
  if (result.status === 'failed') {
    console.log(`❌ ${result.error?.code ?? 'ERROR'}: ${result.error?.message ?? 'Pipeline failed'}\n`);
  } else {
    console.log('📊 ANSWER:\n');
    console.log(result.answer);
  }
  console.log('━'.repeat(80));

  if (result.resolvedQuery !== result.query) {
    console.log(`\n↪ Resolved: ${result.resolvedQuery}`);
  }
  console.log(`\n✓ Intent: ${result.intent?.intent ?? 'n/a'} (${((result.intent?.confidence ?? 0) * 100).toFixed(0)}%)`);
  console.log(`✓ Confidence: ${(result.confidence * 100).toFixed(1)}%${result.lowConfidence ? ' (low)' : ''}`);

  if (result.graphFacts.length > 0) {
    console.log('\n🔗 Graph facts:');
    result.graphFacts.forEach(fact => console.log(`   - ${fact}`));
  }
  if (result.sources.length > 0) {
    console.log('\n📄 Sources:');
    result.sources.forEach(source => {
      const title = source.metadata.document_title ?? source.metadata.document_id;
      const marker = source.metadata.cited ? '*' : ' ';
      console.log(`  ${marker}[${source.metadata.citation}] ${title} (${source.score.toFixed(2)})`);
    });
  }
  console.log('');
}

async function initCLI() {
  await mongoose.connect(config.mongodb.uri, {
    dbName: config.mongodb.dbName,
  });

  const services = createProductionServices();
  const sessionId = uuidv4();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log('\n🔧 Maintenance GraphRAG CLI\n');
  console.log('Type your question or "exit" to quit\n');

  const askQuestion = () => {
    rl.question('graphrag > ', async (input) => {
      const query = input.trim();

      if (query.toLowerCase() === 'exit') {
        console.log('\nGoodbye! 👋\n');
        rl.close();
        await mongoose.disconnect();
        process.exit(0);
      }

      if (!query) {
        askQuestion();
        return;
      }

      try {
        console.log('\n⏳ Processing...\n');

        const result = await services.orchestrator.run(query, {
          sessionId,
          onStep: (step) => console.log(`   · ${step.stage} (${step.durationMs}ms) ${step.description}`),
        });
        console.log('');
        printResult(result);
      } catch (error) {
        console.error('\n❌ Error:', errorMessage(error), '\n');
      }

      askQuestion();
    });
  };

  askQuestion();
}

if (require.main === module) {
  initCLI().catch(console.error);
}
