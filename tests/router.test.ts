import { describe, it, expect } from 'vitest';
import { IntentRouter } from '../src/router/index.js';
import { DialogueMemory } from '../src/services/memory.js';
import { getLocale } from '../src/locales/index.js';
import { FakeCompletionClient } from './mocks/fakes.js';

describe('IntentRouter (zh)', () => {
  const pack = getLocale('zh');

  function setup(replies: Array<string | Error>) {
    const llm = new FakeCompletionClient(replies);
    const router = new IntentRouter(llm, pack);
    const memory = new DialogueMemory({ roleLabels: pack.roles });
    return { llm, router, memory };
  }

  it('routes keyword queries with a location straight to the tool', async () => {
    const { llm, router, memory } = setup([]);
    const decision = await router.decide('北京现在天气怎么样', memory);

    expect(decision).toEqual({ shouldCallTool: true, city: '北京', source: 'keyword' });
    expect(llm.calls).toHaveLength(0);
  });

  it('asks the classifier when keywords match but no location is found', async () => {
    const { llm, router, memory } = setup(['否']);
    const decision = await router.decide('明天会下雨吗', memory);

    expect(decision).toEqual({ shouldCallTool: false, city: null, source: 'classifier' });
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0].options).toEqual({ temperature: 0, maxTokens: 50 });
    expect(llm.calls[0].messages[1]).toEqual({ role: 'user', content: '明天会下雨吗' });
    expect(llm.calls[0].messages[0].content).toContain('当前对话上下文：\n无\n');
  });

  it('takes a labelled city from the classifier', async () => {
    const { router, memory } = setup(['是\n城市: 杭州']);
    expect(await router.decide('那边冷吗', memory)).toEqual({
      shouldCallTool: true,
      city: '杭州',
      source: 'classifier',
    });
  });

  it('accepts a full-width colon in the label', async () => {
    const { router, memory } = setup(['是，城市：成都。']);
    const decision = await router.decide('那边冷吗', memory);
    expect(decision.city).toBe('成都');
  });

  it('falls back to extraction when the classifier says yes without a city', async () => {
    const { router, memory } = setup(['是']);
    expect(await router.decide('上海冷吗', memory)).toEqual({
      shouldCallTool: true,
      city: '上海',
      source: 'classifier',
    });
  });

  it('answers directly when nothing can be extracted', async () => {
    const { router, memory } = setup(['是']);
    const decision = await router.decide('随便聊聊', memory);
    expect(decision.shouldCallTool).toBe(false);
  });

  it('treats a classifier failure as no tool', async () => {
    const { router, memory } = setup([new Error('connection refused')]);
    expect(await router.decide('随便聊聊', memory)).toEqual({
      shouldCallTool: false,
      city: null,
      source: 'classifier-error',
    });
  });

  it('puts recent dialogue into the classifier prompt', async () => {
    const { llm, router, memory } = setup(['否']);
    memory.record('user', '北京天气');
    memory.record('assistant', '晴');

    await router.decide('谢谢', memory);
    expect(llm.calls[0].messages[0].content).toContain('用户: 北京天气\n助手: 晴');
  });

  it('uses the configured classifier budget', async () => {
    const llm = new FakeCompletionClient(['否']);
    const router = new IntentRouter(llm, pack, { classifierMaxTokens: 10 });
    await router.decide('你好', new DialogueMemory());
    expect(llm.calls[0].options?.maxTokens).toBe(10);
  });
});

describe('IntentRouter (en)', () => {
  const pack = getLocale('en');

  it('reads a multi-word labelled city', async () => {
    const router = new IntentRouter(new FakeCompletionClient(['Yes, city: New York.']), pack);
    const decision = await router.decide('Is it cold there?', new DialogueMemory());
    expect(decision).toEqual({ shouldCallTool: true, city: 'New York', source: 'classifier' });
  });

  it('honours a negative answer', async () => {
    const router = new IntentRouter(new FakeCompletionClient(['No']), pack);
    const decision = await router.decide('Tell me a joke', new DialogueMemory());
    expect(decision).toEqual({ shouldCallTool: false, city: null, source: 'classifier' });
  });

  it('routes an enumerated city on a keyword hit', async () => {
    const llm = new FakeCompletionClient([]);
    const router = new IntentRouter(llm, pack);
    const decision = await router.decide('Will it rain in Chengdu tomorrow?', new DialogueMemory());
    expect(decision).toEqual({ shouldCallTool: true, city: 'Chengdu', source: 'keyword' });
    expect(llm.calls).toHaveLength(0);
  });
});
