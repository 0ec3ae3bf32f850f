import { z } from 'zod';
import { Agent, Runner, type SyncTool } from '../src/index.js';
import { MockCompletionClient, textTurn, toolCallTurn } from '../src/testing/index.js';

const weatherTool: SyncTool = {
  kind: 'sync',
  name: 'get_weather',
  description: 'Current weather for a city',
  parameters: {
    type: 'object',
    properties: { city: { type: 'string', description: 'City name' } },
    required: ['city']
  },
  schema: z.object({ city: z.string() }),
  execute: (args) => ({ city: args['city'], condition: 'sunny', temperature: 21 })
};

const client = new MockCompletionClient({
  turns: [
    toolCallTurn([{ name: 'get_weather', arguments: { city: 'Lisbon' } }]),
    textTurn('It is sunny and 21 degrees in Lisbon.', { chunkSize: 8 })
  ]
});

const agent = new Agent({
  name: 'Assistant',
  instructions: 'Answer questions for {user}. Use tools when they help.',
  client,
  tools: [weatherTool]
});

const runner = new Runner(agent);

for await (const chunk of runner.run('What is the weather in Lisbon?', { context: { user: 'Ada' } })) {
  if (chunk.type === 'content_delta') process.stdout.write(chunk.delta);
  if (chunk.type === 'tool_call_result') console.log(`[${chunk.name}] ${chunk.output}`);
}
process.stdout.write('\n');
