import { Agent, Runner, type Tool } from '../src/index.js';
import { MockCompletionClient, textTurn, toolCallTurn } from '../src/testing/index.js';

const refundTool: Tool = {
  kind: 'async',
  name: 'issue_refund',
  description: 'Refund an order',
  requireConfirmation: true,
  execute: async (args) => `Refunded order ${String(args['orderId'])}`
};

const billing = new Agent({
  name: 'Billing',
  instructions: 'Handle refunds and invoices.',
  client: new MockCompletionClient({
    turns: [
      toolCallTurn([{ id: 'call_refund', name: 'issue_refund', arguments: { orderId: 'A-17' } }]),
      textTurn('Your refund is on its way.'),
      toolCallTurn([{ name: 'transfer_to_parent' }])
    ]
  }),
  tools: [refundTool]
});

const triage = new Agent({
  name: 'Triage',
  instructions: 'Route each request to the right agent.',
  client: new MockCompletionClient({
    turns: [toolCallTurn([{ name: 'transfer_to_agent', arguments: { name: 'Billing' } }])]
  }),
  handoffs: [billing]
});

const runner = new Runner(triage, { logger: { level: 'info' } });

const includes = ['agent_switch', 'require_confirm', 'tool_call_result', 'assistant_message'] as const;

for await (const chunk of runner.run('I want a refund for order A-17', { includes })) {
  console.log(chunk.type, chunk.type === 'agent_switch' ? `${chunk.from} -> ${chunk.to}` : '');
}

const pending = runner.pendingConfirmation;
if (pending) {
  console.log(`Approving ${pending.name}(${pending.arguments})`);
  for await (const chunk of runner.runContinue({ approve: true, includes })) {
    if (chunk.type === 'assistant_message') console.log(chunk.message.content);
  }
}

console.log(`Current agent: ${runner.agent.name}`);
