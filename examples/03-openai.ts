import { Agent, Runner, createCompletionClient, createLogger, loadConfig } from '../src/index.js';

// Reads ~/.tandem/config.json, TANDEM_* variables and OPENAI_API_KEY.
const config = await loadConfig();
const logger = createLogger(config.logger);

const client = await createCompletionClient(config.llm);
const agent = new Agent({
  name: 'Assistant',
  instructions: 'You are concise. Today is {date}.',
  client,
  logger
});

const runner = new Runner(agent, {
  maxSteps: config.runner.maxSteps,
  recordTo: config.runner.recordTo,
  logger
});

const input = process.argv.slice(2).join(' ') || 'Say hello in three languages.';
for await (const chunk of runner.run(input, { context: { date: new Date().toDateString() } })) {
  if (chunk.type === 'content_delta') process.stdout.write(chunk.delta);
}
process.stdout.write('\n');
