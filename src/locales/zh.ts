// src/locales/zh.ts
import type { LocalePack, LocationLists } from './types.js';
import { alternation } from './patterns.js';

const CLASSIFIER_PROMPT = `你是一个帮助判断用户意图的助手。请判断用户是否在询问天气信息。
如果是，提取其中的城市名称；如果不是，返回None。

判断原则：
1. 如果查询明显是询问天气（包含"天气"、"温度"、"湿度"、"下雨"等词），且指定了城市，则应该调用天气查询工具
2. 如果查询是闲聊、一般性问题或不需要外部数据的请求，则不需要调用工具
3. 如果查询格式不符合标准天气查询格式（如"北京现在天气如何"），但意图明显是查询天气，仍应调用工具
4. 优先使用工具获取实时数据，而不是依赖内置知识

当前对话上下文：
{context}

请根据以上原则，判断以下查询是否需要调用工具（回答"是"或"否"），如果需要调用工具，请按"城市: <城市名>"的格式给出城市名称：`;

const DIRECT_PROMPT = `你是一个友好的AI助手，能够理解上下文并提供有帮助的回答。
当前对话上下文：
{context}

用户问题：
{query}

请根据上下文和用户问题，提供自然、有帮助的回答。`;

export function createZhLocale(lists: LocationLists): LocalePack {
  return {
    id: 'zh',

    weatherKeywords: ['天气', '温度', '气温', '湿度', '下雨', '下雪', '晴天', '雨天', '多云', '风力'],
    outdoorCues: ['外出'],
    fillers: [/你/g, /请问/g, /知道/g],
    patterns: {
      phrase: /(.+?)(?:现在|今天|的)天气/,
      city: new RegExp(`((?:${alternation(lists.cities)})(?:市|省)?)`),
      province: new RegExp(`((?:${alternation(lists.provinces)})(?:自治区|省|市)?)`),
    },

    negativeMarkers: ['否', '不需要', 'none'],
    cityLabel: /城市[:：]\s*([^\s,，。.]+)/,

    roles: { user: '用户', assistant: '助手' },
    noContext: '无',

    prompts: {
      classifier: CLASSIFIER_PROMPT,
      direct: DIRECT_PROMPT,
    },

    messages: {
      toolFailure: (city) =>
        `抱歉，我暂时无法获取${city}的天气信息。你可以稍后再试，或者查看天气预报应用获取最新信息。`,
      directFailure: '抱歉，我暂时无法处理这个请求，请稍后再试。',
      turnFailure: '抱歉，处理你的请求时出现了错误，请稍后再试。',
    },

    report: {
      placeholder: '未知',
      heading: (location) => `🌍 ${location}当前天气：`,
      temperature: '🌡 温度',
      humidity: '💧 湿度',
      windSpeed: '🌬 风速',
      conditions: '🌤 天气',
    },

    suitability: {
      levels: { marginal: '不太适合', unsuitable: '不适合' },
      reasons: {
        highTemperature: '气温较高',
        extremeHeat: '气温过高',
        lowTemperature: '气温较低',
        extremeCold: '气温过低',
        precipitation: '有降水',
        strongWind: '风力较大',
        veryStrongWind: '风力过大',
        poorAirQuality: '空气质量较差',
        badAirQuality: '空气质量差',
      },
      reasonSeparator: '、',
      good: '✅ 当前天气状况良好，**适合外出活动**。建议根据天气情况适当着装。',
      warning: (reasons, level) => `⚠️ 当前天气${reasons}，**${level}外出**。建议根据实际情况调整计划。`,
    },

    repl: {
      banner: '🤖 天气助手已启动！输入 "quit" 退出，输入 "clear" 清空对话记忆',
      prompt: '\n你: ',
      cleared: '🧹 对话记忆已清空',
      goodbye: '再见！👋',
    },
  };
}
