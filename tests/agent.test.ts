import { describe, it, expect } from 'vitest';
import { Agent } from '../src/agent/index.js';
import { IntentRouter } from '../src/router/index.js';
import { WeatherTool } from '../src/tools/weather.js';
import { DialogueMemory } from '../src/services/memory.js';
import { Gazetteer } from '../src/services/gazetteer.js';
import { getLocale } from '../src/locales/index.js';
import type { NormalizedWeatherResult, ToolCallResult } from '../src/tools/types.js';
import { FakeCompletionClient, FakeToolTransport, providerPayload, textResult } from './mocks/fakes.js';

const pack = getLocale('zh');
const gazetteer = new Gazetteer({ 北京: 'Beijing' }, { transliterate: null });

function setup(replies: Array<string | Error>, respond: () => Promise<ToolCallResult | null>) {
  const llm = new FakeCompletionClient(replies);
  const transport = new FakeToolTransport(['query_weather'], respond);
  const memory = new DialogueMemory({ roleLabels: pack.roles });
  const agent = new Agent({
    locale: pack,
    llm,
    router: new IntentRouter(llm, pack),
    weather: new WeatherTool(transport, gazetteer),
    memory,
  });
  return { agent, llm, transport, memory };
}

const sunny = async () => textResult(JSON.stringify(providerPayload()));

describe('Agent.processQuery', () => {
  it('answers a weather question with a report and records both turns', async () => {
    const { agent, transport, memory } = setup([], sunny);

    const reply = await agent.processQuery('北京现在天气怎么样');

    expect(reply).toBe('🌍 Beijing, CN当前天气：\n🌡 温度: 20°C\n💧 湿度: 40%\n🌬 风速: 3 m/s\n🌤 天气: clear sky');
    expect(transport.calls).toEqual([{ name: 'query_weather', args: { city: 'Beijing' } }]);
    expect(memory.size).toBe(2);
    expect(memory.turns().map((t) => [t.role, t.text])).toEqual([
      ['user', '北京现在天气怎么样'],
      ['assistant', reply],
    ]);
  });

  it('adds outdoor advice when the user asks about going out', async () => {
    const { agent } = setup([], sunny);
    const reply = await agent.processQuery('北京现在天气适合外出吗');
    expect(reply.endsWith(`\n\n${pack.suitability.good}`)).toBe(true);
  });

  it('names the requested city when the lookup fails', async () => {
    const { agent, memory } = setup([], async () => textResult('city not found', true));
    const reply = await agent.processQuery('北京现在天气怎么样');

    expect(reply).toBe(pack.messages.toolFailure('北京'));
    expect(memory.turns()[1].text).toBe(reply);
  });

  it('answers other questions directly with the dialogue as context', async () => {
    const { agent, llm } = setup(['否', '为什么程序员分不清万圣节和圣诞节？'], sunny);

    const reply = await agent.processQuery('讲个笑话');

    expect(reply).toBe('为什么程序员分不清万圣节和圣诞节？');
    expect(llm.calls).toHaveLength(2);
    expect(llm.calls[1].messages).toHaveLength(1);
    expect(llm.calls[1].messages[0].role).toBe('system');
    expect(llm.calls[1].messages[0].content).toContain('当前对话上下文：\n用户: 讲个笑话\n');
    expect(llm.calls[1].messages[0].content).toContain('用户问题：\n讲个笑话\n');
  });

  it('apologizes when the direct answer fails', async () => {
    const { agent, memory } = setup(['否', new Error('timeout')], sunny);
    expect(await agent.processQuery('讲个笑话')).toBe(pack.messages.directFailure);
    expect(memory.size).toBe(2);
  });

  it('records the generic apology when routing throws', async () => {
    const memory = new DialogueMemory();
    const agent = new Agent({
      locale: pack,
      llm: new FakeCompletionClient([]),
      router: {
        decide: async () => {
          throw new Error('router exploded');
        },
      },
      weather: { invoke: async () => ({ kind: 'text', text: 'unused' }) },
      memory,
    });

    expect(await agent.processQuery('你好')).toBe(pack.messages.turnFailure);
    expect(memory.turns().map((t) => t.text)).toEqual(['你好', pack.messages.turnFailure]);
  });

  it('rejects a second turn while one is running', async () => {
    let release: (result: NormalizedWeatherResult) => void = () => undefined;
    const pending = new Promise<NormalizedWeatherResult>((resolve) => {
      release = resolve;
    });
    const memory = new DialogueMemory();
    const agent = new Agent({
      locale: pack,
      llm: new FakeCompletionClient([]),
      router: new IntentRouter(new FakeCompletionClient([]), pack),
      weather: { invoke: () => pending },
      memory,
    });

    const first = agent.processQuery('北京现在天气怎么样');
    expect(await agent.processQuery('上海天气')).toBe(pack.messages.turnFailure);

    release({ kind: 'text', text: '晴' });
    expect(await first).toBe('晴');
    expect(memory.turns().map((t) => t.text)).toEqual(['北京现在天气怎么样', '晴']);

    // Idle again afterwards
    expect(await agent.processQuery('北京现在天气怎么样')).toBe('晴');
  });

  it('forgets the dialogue on reset', async () => {
    const { agent, memory } = setup([], sunny);
    await agent.processQuery('北京现在天气怎么样');
    agent.reset();
    expect(memory.size).toBe(0);
  });
});
