// src/agent/compose.ts
// Turns a normalized weather result into the reply text

import type { LocalePack, SuitabilityLevel, SuitabilityReason } from '../locales/types.js';
import type { NormalizedWeatherResult, WeatherFields } from '../tools/types.js';

export interface SuitabilityAssessment {
  level: SuitabilityLevel;
  reasons: SuitabilityReason[];
}

const SEVERITY: Record<SuitabilityLevel, number> = { suitable: 0, marginal: 1, unsuitable: 2 };

const PRECIPITATION_KEYWORDS = ['rain', 'thunderstorm', 'drizzle', 'snow', 'shower'];

/**
 * Outdoor suitability from current conditions. Each rule can only make the
 * level worse; every rule that fires adds its reason.
 */
export function assessSuitability(fields: WeatherFields): SuitabilityAssessment {
  let level: SuitabilityLevel = 'suitable';
  const reasons: SuitabilityReason[] = [];

  const flag = (next: SuitabilityLevel, reason: SuitabilityReason) => {
    if (SEVERITY[next] > SEVERITY[level]) level = next;
    reasons.push(reason);
  };

  const { temperature, description, windSpeed, airQuality } = fields;

  if (temperature > 35) flag('unsuitable', 'extremeHeat');
  else if (temperature > 30) flag('marginal', 'highTemperature');
  else if (temperature < -5) flag('unsuitable', 'extremeCold');
  else if (temperature < 5) flag('marginal', 'lowTemperature');

  const desc = description.toLowerCase();
  if (PRECIPITATION_KEYWORDS.some((keyword) => desc.includes(keyword))) {
    flag('marginal', 'precipitation');
  }

  if (windSpeed > 15) flag('unsuitable', 'veryStrongWind');
  else if (windSpeed > 10) flag('marginal', 'strongWind');

  if (airQuality !== undefined) {
    if (airQuality > 200) flag('unsuitable', 'badAirQuality');
    else if (airQuality > 150) flag('marginal', 'poorAirQuality');
  }

  return { level, reasons };
}

function withUnit(value: number | undefined, unit: string, placeholder: string): string {
  return value === undefined ? placeholder : `${value}${unit}`;
}

function renderFields(fields: WeatherFields, pack: LocalePack): string {
  const { report } = pack;
  const location = fields.location
    ? fields.country ? `${fields.location}, ${fields.country}` : fields.location
    : report.placeholder;

  return [
    report.heading(location),
    `${report.temperature}: ${withUnit(fields.temperature, '°C', report.placeholder)}`,
    `${report.humidity}: ${withUnit(fields.humidity, '%', report.placeholder)}`,
    `${report.windSpeed}: ${withUnit(fields.windSpeed, ' m/s', report.placeholder)}`,
    `${report.conditions}: ${fields.description || report.placeholder}`,
  ].join('\n');
}

export function formatReport(result: NormalizedWeatherResult, pack: LocalePack): string {
  switch (result.kind) {
    case 'text':
      return result.text;
    case 'structured':
      return renderFields(result.fields, pack);
    case 'error':
      return pack.messages.turnFailure;
  }
}

export function formatSuitability(result: NormalizedWeatherResult, pack: LocalePack): string {
  if (result.kind !== 'structured') {
    return formatReport(result, pack);
  }

  const { level, reasons } = assessSuitability(result.fields);
  const verdict = level === 'suitable'
    ? pack.suitability.good
    : pack.suitability.warning(
        reasons.map((reason) => pack.suitability.reasons[reason]).join(pack.suitability.reasonSeparator),
        pack.suitability.levels[level]
      );

  return `${renderFields(result.fields, pack)}\n\n${verdict}`;
}
