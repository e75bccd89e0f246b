import { describe, it, expect, vi } from 'vitest';
import { ToolOrchestrator, SYSTEM_PROMPT, NO_FINAL_RESPONSE } from '../index.js';
import { ToolRegistry } from '../../tools/registry.js';
import type { Tool, ToolOutput } from '../../tools/types.js';
import type { CompletionClient } from '../../../providers/types.js';
import { ScriptedClient, textResponse, toolUseResponse } from '../../../test-utils/scripted-client.js';

function searchTool(respond: (args: Record<string, unknown>) => Promise<ToolOutput>) {
  const execute = vi.fn(respond);
  const tool: Tool = {
    definition: () => ({
      name: 'search_course_content',
      description: 'Search course materials',
      parameters: [{ name: 'query', type: 'string', description: 'What to search for', required: true }],
    }),
    execute,
  };
  return { tool, execute };
}

function setup(respond: (args: Record<string, unknown>) => Promise<ToolOutput>) {
  const registry = new ToolRegistry();
  const { tool, execute } = searchTool(respond);
  registry.register(tool);
  return { registry, execute, tools: registry.definitions() };
}

const searchCall = (id: string, query: string) => ({ id, name: 'search_course_content', input: { query } });

describe('ToolOrchestrator', () => {
  describe('direct answers', () => {
    it('should make one call and return the text when no tool is requested', async () => {
      const { registry, execute, tools } = setup(async () => ({ content: 'unused' }));
      const client = new ScriptedClient([textResponse('Paris is the capital of France.')]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 2 }).respond(
        'What is the capital of France?',
        undefined,
        tools,
        registry,
      );

      expect(answer).toBe('Paris is the capital of France.');
      expect(client.requests).toHaveLength(1);
      expect(client.requests[0]).toEqual({
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: 'What is the capital of France?' }],
        tools,
        toolChoice: 'auto',
      });
      expect(execute).not.toHaveBeenCalled();
    });

    it('should include prior conversation in the system prompt', async () => {
      const client = new ScriptedClient([textResponse('Sure.')]);

      await new ToolOrchestrator(client).respond('And lesson 2?', 'User: hi\nAssistant: hello');

      expect(client.requests[0].system).toBe(`${SYSTEM_PROMPT}\n\nPrevious conversation:\nUser: hi\nAssistant: hello`);
    });

    it('should not attach tools or run any when no registry is supplied', async () => {
      const client = new ScriptedClient([
        {
          stopReason: 'tool_use',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'tool_use', id: 'c1', name: 'search_course_content', input: { query: 'x' } },
          ],
        },
      ]);

      const answer = await new ToolOrchestrator(client).respond('Anything?');

      expect(answer).toBe('Let me check.');
      expect(client.requests).toHaveLength(1);
      expect(client.requests[0].tools).toBeUndefined();
      expect(client.requests[0].toolChoice).toBeUndefined();
    });

    it('should apologize when the first request fails', async () => {
      const { registry, execute, tools } = setup(async () => ({ content: 'unused' }));
      const client = new ScriptedClient([new Error('connect ECONNREFUSED')]);

      const answer = await new ToolOrchestrator(client).respond('What is recall?', undefined, tools, registry);

      expect(answer).toBe(
        'I encountered an error while processing your question: connect ECONNREFUSED. Please try rephrasing your question.',
      );
      expect(client.requests).toHaveLength(1);
      expect(execute).not.toHaveBeenCalled();
    });
  });

  describe('tool rounds', () => {
    it('should make exactly two calls for a single tool round', async () => {
      const { registry, execute, tools } = setup(async () => ({
        content: '[Intro to ML - Lesson 1]\nLabelled examples.',
        sources: ['Intro to ML - Lesson 1'],
      }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('call_1', 'supervised')),
        textResponse('Supervised learning uses labelled data.'),
      ]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 2 }).respond(
        'What is supervised learning?',
        undefined,
        tools,
        registry,
      );

      expect(answer).toBe('Supervised learning uses labelled data.');
      expect(client.requests).toHaveLength(2);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute).toHaveBeenCalledWith({ query: 'supervised' });
      expect(client.requests[1].messages).toEqual([
        { role: 'user', content: 'What is supervised learning?' },
        { role: 'assistant', content: [{ type: 'tool_use', ...searchCall('call_1', 'supervised') }] },
        {
          role: 'user',
          content: [{ type: 'tool_result', tool_use_id: 'call_1', content: '[Intro to ML - Lesson 1]\nLabelled examples.' }],
        },
      ]);
      expect(client.requests[1].tools).toEqual(tools);
      expect(registry.allSources()).toEqual(['Intro to ML - Lesson 1']);
    });

    it('should execute every block of a round in the order emitted', async () => {
      const { registry, execute, tools } = setup(async args => ({ content: `hits for ${String(args.query)}` }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('a', 'first'), searchCall('b', 'second')),
        textResponse('Both covered.'),
      ]);

      await new ToolOrchestrator(client).respond('Compare', undefined, tools, registry);

      expect(execute.mock.calls.map(call => call[0])).toEqual([{ query: 'first' }, { query: 'second' }]);
      expect(client.requests[1].messages[2]).toEqual({
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'a', content: 'hits for first' },
          { type: 'tool_result', tool_use_id: 'b', content: 'hits for second' },
        ],
      });
    });

    it('should stop at the round limit and force a closing answer', async () => {
      const { registry, execute, tools } = setup(async () => ({ content: 'partial' }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'one')),
        toolUseResponse(searchCall('c2', 'two')),
        toolUseResponse(searchCall('c3', 'three')),
        textResponse('Here is what I found.'),
      ]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 2 }).respond('Deep question', undefined, tools, registry);

      expect(answer).toBe('Here is what I found.');
      expect(execute).toHaveBeenCalledTimes(2);
      expect(client.requests).toHaveLength(4);
      expect(client.requests[1].tools).toEqual(tools);
      expect(client.requests[2].tools).toBeUndefined();
      expect(client.requests[3].tools).toBeUndefined();
      expect(client.requests[3].messages).toHaveLength(5);
    });

    it('should treat a maximum below one as a single round', async () => {
      const { registry, execute, tools } = setup(async () => ({ content: 'partial' }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'one')),
        toolUseResponse(searchCall('c2', 'two')),
        textResponse('closing'),
      ]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 0 }).respond('Q', undefined, tools, registry);

      expect(answer).toBe('closing');
      expect(execute).toHaveBeenCalledTimes(1);
      expect(client.requests).toHaveLength(3);
      expect(client.requests[1].tools).toBeUndefined();
    });

    it('should fall back to a fixed message when the final answer is empty', async () => {
      const { registry, tools } = setup(async () => ({ content: 'partial' }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'one')),
        { stopReason: 'end', content: [] },
      ]);

      const answer = await new ToolOrchestrator(client).respond('Q', undefined, tools, registry);

      expect(answer).toBe(NO_FINAL_RESPONSE);
    });

    it('should accumulate deduplicated sources across rounds', async () => {
      const sourcesByQuery: Record<string, string[]> = {
        basics: ['Intro to ML - Lesson 1', 'Intro to ML - Lesson 2'],
        metrics: ['Intro to ML - Lesson 2'],
      };
      const { registry, tools } = setup(async args => ({
        content: `hits for ${String(args.query)}`,
        sources: sourcesByQuery[String(args.query)] ?? [],
      }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'basics')),
        toolUseResponse(searchCall('c2', 'metrics')),
        textResponse('done'),
      ]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 2 }).respond('Q', undefined, tools, registry);

      expect(answer).toBe('done');
      expect(client.requests).toHaveLength(3);
      expect(registry.allSources()).toEqual(['Intro to ML - Lesson 1', 'Intro to ML - Lesson 2']);
      expect(registry.callHistory().map(entry => entry.params)).toEqual([{ query: 'basics' }, { query: 'metrics' }]);
    });

    it('should reset the registry at the start of each invocation', async () => {
      const { registry, tools } = setup(async () => ({ content: 'hit', sources: ['Old - Lesson 1'] }));
      await registry.execute('search_course_content', { query: 'earlier' });

      const client = new ScriptedClient([textResponse('fresh')]);
      await new ToolOrchestrator(client).respond('Q', undefined, tools, registry);

      expect(registry.callHistory()).toEqual([]);
      expect(registry.allSources()).toEqual([]);
    });
  });

  describe('recoverable tool failures', () => {
    it('should feed an unknown tool back to the model as an error result', async () => {
      const { registry, tools } = setup(async () => ({ content: 'unused' }));
      const client = new ScriptedClient([
        toolUseResponse({ id: 'c1', name: 'lookup_weather', input: {} }),
        textResponse('I could not look that up.'),
      ]);

      const answer = await new ToolOrchestrator(client).respond('Weather?', undefined, tools, registry);

      expect(answer).toBe('I could not look that up.');
      expect(client.requests[1].messages[2]).toEqual({
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'c1', content: "Tool 'lookup_weather' not found", is_error: true }],
      });
      expect(registry.callHistory()).toEqual([]);
    });

    it('should feed a throwing tool back to the model as an error result', async () => {
      const { registry, tools } = setup(async () => {
        throw new Error('index offline');
      });
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'anything')),
        textResponse('Search is unavailable right now.'),
      ]);

      const answer = await new ToolOrchestrator(client).respond('Q', undefined, tools, registry);

      expect(answer).toBe('Search is unavailable right now.');
      expect(client.requests[1].messages[2]).toEqual({
        role: 'user',
        content: [
          {
            type: 'tool_result',
            tool_use_id: 'c1',
            content: "Error executing tool 'search_course_content': index offline",
            is_error: true,
          },
        ],
      });
    });
  });

  describe('fallback summaries', () => {
    it('should summarize collected results when the conversation grows too large', async () => {
      const longResult = 'A'.repeat(150);
      const { registry, tools } = setup(async () => ({ content: longResult }));
      const client = new ScriptedClient([toolUseResponse(searchCall('c1', 'everything'))]);

      const answer = await new ToolOrchestrator(client, { maxConversationChars: 100 }).respond(
        'Tell me everything',
        undefined,
        tools,
        registry,
      );

      expect(answer).toBe(
        'My searches returned more material than I can work through in one answer. ' +
          `Here are the partial results from 1 round of searching:\n\n${longResult}`,
      );
      expect(client.requests).toHaveLength(1);
    });

    it('should summarize partial results when a follow-up request fails', async () => {
      const { registry, tools } = setup(async () => ({ content: 'Lesson 1 covers regression.' }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'regression')),
        new Error('socket hang up'),
      ]);

      const answer = await new ToolOrchestrator(client).respond('Q', undefined, tools, registry);

      expect(answer).toBe(
        'I ran into an error before I could finish my answer. ' +
          'Here are the partial results from 1 round of searching:\n\nLesson 1 covers regression.',
      );
    });

    it('should say nothing succeeded when every tool call failed before a follow-up failure', async () => {
      const { registry, tools } = setup(async () => ({ content: 'unused' }));
      const client = new ScriptedClient([
        toolUseResponse({ id: 'c1', name: 'lookup_weather', input: {} }),
        new Error('socket hang up'),
      ]);

      const answer = await new ToolOrchestrator(client).respond('Q', undefined, tools, registry);

      expect(answer).toBe(
        'I ran into an error before I could finish my answer. ' +
          'No tool executions succeeded, so I have no results to share. Please try rephrasing your question.',
      );
    });

    it('should summarize when the forced closing request fails', async () => {
      const { registry, tools } = setup(async args => ({ content: `result for ${String(args.query)}` }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('c1', 'one')),
        toolUseResponse(searchCall('c2', 'two')),
        toolUseResponse(searchCall('c3', 'three')),
        new Error('timeout'),
      ]);

      const answer = await new ToolOrchestrator(client, { maxRounds: 2 }).respond('Q', undefined, tools, registry);

      expect(answer).toBe(
        'I reached the maximum number of search rounds. ' +
          'Here are the partial results from 2 rounds of searching:\n\nresult for one\n\nresult for two',
      );
    });

    it('should include at most the configured number of results', async () => {
      const { registry, tools } = setup(async args => ({ content: `result ${String(args.query)}` }));
      const client = new ScriptedClient([
        toolUseResponse(searchCall('a', '1'), searchCall('b', '2'), searchCall('c', '3'), searchCall('d', '4')),
        new Error('timeout'),
      ]);

      const answer = await new ToolOrchestrator(client, { summaryResultLimit: 3 }).respond('Q', undefined, tools, registry);

      expect(answer).toBe(
        'I ran into an error before I could finish my answer. ' +
          'Here are the partial results from 1 round of searching:\n\nresult 1\n\nresult 2\n\nresult 3',
      );
    });
  });

  it('should give concurrent invocations on a shared registry their own sources', async () => {
    const { registry, tools } = setup(async args => ({
      content: `hits for ${String(args.query)}`,
      sources: [`${String(args.query)} - Lesson 1`],
    }));
    const clientA = new ScriptedClient([toolUseResponse(searchCall('a1', 'A')), textResponse('answer A')]);
    const clientB = new ScriptedClient([toolUseResponse(searchCall('b1', 'B')), textResponse('answer B')]);

    const [first, second] = await Promise.all([
      new ToolOrchestrator(clientA).respondWithSources('QA', undefined, tools, registry),
      new ToolOrchestrator(clientB).respondWithSources('QB', undefined, tools, registry),
    ]);

    expect(first).toEqual({ answer: 'answer A', sources: ['A - Lesson 1'] });
    expect(second).toEqual({ answer: 'answer B', sources: ['B - Lesson 1'] });
  });

  it('should serialize invocations that share a registry', async () => {
    const { registry, tools } = setup(async () => ({ content: 'unused' }));
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const slow: CompletionClient = {
      name: 'slow',
      complete: async () => {
        await gate;
        return textResponse('first');
      },
    };
    const fast = new ScriptedClient([textResponse('second')]);

    const first = new ToolOrchestrator(slow).respond('Q1', undefined, tools, registry);
    const second = new ToolOrchestrator(fast).respond('Q2', undefined, tools, registry);

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(fast.requests).toHaveLength(0);

    release();

    expect(await first).toBe('first');
    expect(await second).toBe('second');
    expect(fast.requests).toHaveLength(1);
  });
});
