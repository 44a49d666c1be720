// src/locales/en.ts
import type { LocalePack, LocationLists } from './types.js';
import { alternation } from './patterns.js';

const CLASSIFIER_PROMPT = `You are an assistant helping to judge user intent. Determine whether the user is asking for weather information.
If yes, extract the city name; if not, return None.

Judgment principles:
1. If the query is clearly asking about weather (containing words like "weather", "temperature", "humidity", "rain", etc.) and specifies a city, the weather query tool should be called
2. If the query is casual chat, a general question, or a request that doesn't require external data, don't call the tool
3. If the query doesn't follow the standard weather query format (e.g. "What's the weather like in Beijing now") but the intent is clearly to query weather, still call the tool
4. Prefer the tool's real-time data over built-in knowledge

Current dialogue context:
{context}

Judge whether the following query needs the tool (answer "yes" or "no"). If it does, give the city as "city: <name>":`;

const DIRECT_PROMPT = `You are a friendly AI assistant capable of understanding context and providing helpful responses.
Current dialogue context:
{context}

User question:
{query}

Provide a natural and helpful response based on the context and the user question.`;

export function createEnLocale(lists: LocationLists): LocalePack {
  return {
    id: 'en',

    weatherKeywords: ['weather', 'temperature', 'humidity', 'rain', 'snow', 'sunny', 'cloudy', 'wind'],
    outdoorCues: ['go out', 'outdoor'],
    fillers: [
      // Question openers would otherwise join the capitalized run in the phrase pattern
      /^\s*(?:(?:what|how)(?:'s|\s+is|\s+was|\s+does)?|is|will|does)\s+/i,
      /\b(?:do|can|could) you (?:know|tell me)\b/gi,
      /\byou\b/gi,
      /\bplease\b/gi,
      /\bknow\b/gi,
    ],
    patterns: {
      // A run of capitalized words (or one word) right before the phrase
      phrase: /((?:[A-Z][\w-]*\s)*[\w'-]+)(?: now| today|'s) weather/,
      city: new RegExp(`\\b((?:${alternation(lists.cities)})(?: city| province)?)\\b`, 'i'),
      province: new RegExp(`\\b((?:${alternation(lists.provinces)})(?: autonomous region| province)?)\\b`, 'i'),
    },

    negativeMarkers: ['no', 'not needed', 'none'],
    cityLabel: /city[:：]\s*([^,.\n]+)/i,

    roles: { user: 'User', assistant: 'Assistant' },
    noContext: 'None',

    prompts: {
      classifier: CLASSIFIER_PROMPT,
      direct: DIRECT_PROMPT,
    },

    messages: {
      toolFailure: (city) =>
        `Sorry, I can't get weather information for ${city} right now. You can try again later or check a weather app for the latest information.`,
      directFailure: "Sorry, I can't process this request right now. Please try again later.",
      turnFailure: 'Sorry, an error occurred while processing your request. Please try again later.',
    },

    report: {
      placeholder: 'N/A',
      heading: (location) => `🌍 ${location}`,
      temperature: '🌡 Temperature',
      humidity: '💧 Humidity',
      windSpeed: '🌬 Wind Speed',
      conditions: '🌤 Conditions',
    },

    suitability: {
      levels: { marginal: 'not very suitable', unsuitable: 'not suitable' },
      reasons: {
        highTemperature: 'high temperature',
        extremeHeat: 'extreme heat',
        lowTemperature: 'low temperature',
        extremeCold: 'extreme cold',
        precipitation: 'precipitation',
        strongWind: 'strong wind',
        veryStrongWind: 'very strong wind',
        poorAirQuality: 'poor air quality',
        badAirQuality: 'bad air quality',
      },
      reasonSeparator: ', ',
      good: '✅ The current weather is good, **suitable for outdoor activities**. Dress appropriately for the conditions.',
      warning: (reasons, level) =>
        `⚠️ The current weather has ${reasons}, **${level} for going out**. Adjust your plans to the actual conditions.`,
    },

    repl: {
      banner: '🤖 Weather assistant started! Type "quit" to exit, "clear" to reset the conversation',
      prompt: '\nYou: ',
      cleared: '🧹 Conversation memory cleared',
      goodbye: 'Goodbye! 👋',
    },
  };
}
