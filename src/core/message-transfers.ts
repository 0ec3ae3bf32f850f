import { messageText, userMessage, type Message } from './messages.js';

/** Rewrites the history an agent sends to its model. The stored history is untouched. */
export type MessageTransfer = (messages: Message[]) => Message[];

function toXml(message: Message): string | null {
  switch (message.type) {
    case 'user':
    case 'assistant':
    case 'system':
      return `  <message role='${message.type}'>${messageText(message)}</message>`;
    case 'function_call':
      return `  <function_call name='${message.name}' arguments='${message.arguments}' />`;
    case 'function_call_output':
      return `  <function_result call_id='${message.callId}'>${message.output}</function_result>`;
    case 'transfer':
      return null;
  }
}

/**
 * Folds the whole history into a single user message holding an XML-like
 * transcript, followed by a question about the next step.
 */
export const consolidateHistoryTransfer: MessageTransfer = messages => {
  if (messages.length === 0) return messages;

  const lines = ['<conversation_history>'];
  for (const message of messages) {
    const line = toXml(message);
    if (line !== null) lines.push(line);
  }
  lines.push('</conversation_history>');

  const content = 'Here is everything that has happened so far:\n\n' + lines.join('\n') + '\n\nWhat should be done next?';
  return [userMessage(content)];
};
