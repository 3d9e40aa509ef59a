export const INTENT_TYPES = [
  'CLUB_ADJUSTMENT',
  'RECOVERY_CHECK',
  'SHOT_RECOMMENDATION',
  'SCORE_ENTRY',
  'PATTERN_QUERY',
  'DRILL_REQUEST',
  'WEATHER_CHECK',
  'STATS_LOOKUP',
  'ROUND_START',
  'ROUND_END',
  'EQUIPMENT_INFO',
  'COURSE_INFO',
  'SETTINGS_CHANGE',
  'HELP_REQUEST',
  'FEEDBACK',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export const MODULES = ['CADDY', 'COACH', 'RECOVERY', 'SETTINGS'] as const;

export type Module = (typeof MODULES)[number];

export const PREREQUISITES = ['ROUND_ACTIVE', 'BAG_CONFIGURED', 'RECOVERY_DATA', 'COURSE_SELECTED'] as const;

export type Prerequisite = (typeof PREREQUISITES)[number];

export interface RoutingTarget {
  module: Module;
  screen: string;
  parameters: Readonly<Record<string, string>>;
}

export function isIntentType(value: string): value is IntentType {
  return (INTENT_TYPES as readonly string[]).includes(value);
}
