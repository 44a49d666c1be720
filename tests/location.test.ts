import { describe, it, expect } from 'vitest';
import { getLocale } from '../src/locales/index.js';
import { extractLocation, hasOutdoorCue, isWeatherQuery } from '../src/router/location.js';

describe('location extraction (zh)', () => {
  const pack = getLocale('zh');

  it('takes the phrase before 现在天气', () => {
    expect(extractLocation('北京现在天气怎么样', pack)).toEqual({
      rawText: '北京现在天气怎么样',
      resolvedCity: '北京',
      tier: 'phrase',
    });
  });

  it('drops fillers before matching an enumerated city', () => {
    const query = extractLocation('你知道上海天气吗', pack);
    expect(query.resolvedCity).toBe('上海');
    expect(query.tier).toBe('city');
  });

  it('keeps an administrative suffix on a city', () => {
    expect(extractLocation('杭州市下雨吗', pack).resolvedCity).toBe('杭州市');
  });

  it('falls back to provinces', () => {
    const query = extractLocation('黑龙江省冷不冷', pack);
    expect(query.resolvedCity).toBe('黑龙江省');
    expect(query.tier).toBe('province');
  });

  it('returns null when nothing matches', () => {
    expect(extractLocation('明天会下雨吗', pack)).toEqual({ rawText: '明天会下雨吗', resolvedCity: null });
  });

  it('detects weather keywords and outdoor cues', () => {
    expect(isWeatherQuery('成都气温多少', pack)).toBe(true);
    expect(isWeatherQuery('讲个笑话', pack)).toBe(false);
    expect(hasOutdoorCue('北京现在天气适合外出吗', pack)).toBe(true);
    expect(hasOutdoorCue('北京现在天气怎么样', pack)).toBe(false);
  });
});

describe('location extraction (en)', () => {
  const pack = getLocale('en');

  it("takes the capitalized name before 's weather", () => {
    const query = extractLocation("What is Shanghai's weather like?", pack);
    expect(query.resolvedCity).toBe('Shanghai');
    expect(query.tier).toBe('phrase');
  });

  it('leaves a question opener out of the city', () => {
    expect(extractLocation("What's Beijing's weather like?", pack)).toEqual({
      rawText: "What's Beijing's weather like?",
      resolvedCity: 'Beijing',
      tier: 'phrase',
    });
    expect(extractLocation("Is Hong Kong's weather good today?", pack).resolvedCity).toBe('Hong Kong');
    expect(extractLocation("How is Xi'an's weather?", pack).resolvedCity).toBe("Xi'an");
  });

  it('drops the polite filler before the phrase', () => {
    expect(extractLocation("Do you know Chengdu's weather?", pack).resolvedCity).toBe('Chengdu');
  });

  it('matches an enumerated city case-insensitively', () => {
    const query = extractLocation('is it going to rain in hangzhou tomorrow', pack);
    expect(query.resolvedCity).toBe('hangzhou');
    expect(query.tier).toBe('city');
  });

  it('falls back to provinces', () => {
    const query = extractLocation('how windy is Inner Mongolia', pack);
    expect(query.resolvedCity).toBe('Inner Mongolia');
    expect(query.tier).toBe('province');
  });

  it('returns null for unknown places outside the phrase form', () => {
    expect(extractLocation('what is the weather in London', pack).resolvedCity).toBeNull();
  });

  it('detects weather keywords and outdoor cues case-insensitively', () => {
    expect(isWeatherQuery('Weather in Beijing?', pack)).toBe(true);
    expect(isWeatherQuery('tell me a joke', pack)).toBe(false);
    expect(hasOutdoorCue('Can I go out in Beijing today?', pack)).toBe(true);
    expect(hasOutdoorCue('Outdoor run in Beijing?', pack)).toBe(true);
  });
});
