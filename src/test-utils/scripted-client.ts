// Completion client that replays a fixed script of responses and failures

import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
} from '../providers/types.js';

export type ScriptStep = CompletionResponse | Error;

export class ScriptedClient implements CompletionClient {
  name = 'scripted';
  requests: CompletionRequest[] = [];

  constructor(public steps: ScriptStep[]) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    // The orchestrator keeps appending to the same array, so record a copy
    this.requests.push({ ...request, messages: [...request.messages] });

    const step = this.steps.shift();
    if (!step) {
      throw new Error('No scripted response left');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export function textResponse(text: string): CompletionResponse {
  return { stopReason: 'end', content: [{ type: 'text', text }] };
}

export function toolUseResponse(
  ...calls: Array<{ id: string; name: string; input: Record<string, unknown> }>
): CompletionResponse {
  return {
    stopReason: 'tool_use',
    content: calls.map(call => ({ type: 'tool_use' as const, ...call })),
  };
}
