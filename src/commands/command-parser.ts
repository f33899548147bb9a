import { ScalingAction, ScalingMetric } from '../types';

export type ParsedCommand =
  | { action: 'health_check'; endpoint: string; interval: number }
  | { action: 'route_traffic'; source: string; target: string; weight: number }
  | { action: 'auto_scale'; metric: ScalingMetric; threshold: number; scaleAction: ScalingAction }
  | { action: 'get_status'; target?: string }
  | { action: 'help' }
  | { action: 'clear' }
  | { action: 'unknown'; command: string };

interface Rule {
  pattern: RegExp;
  build(match: RegExpMatchArray, command: string): ParsedCommand;
}

const DEFAULT_INTERVAL_SECONDS = 30;

function intervalFrom(amount: string | undefined, unit: string | undefined): number {
  if (amount === undefined) {
    return DEFAULT_INTERVAL_SECONDS;
  }
  const seconds = parseInt(amount, 10);
  return unit !== undefined && unit.startsWith('minute') ? seconds * 60 : seconds;
}

function health(match: RegExpMatchArray): ParsedCommand {
  return { action: 'health_check', endpoint: match[1], interval: intervalFrom(match[2], match[3]) };
}

function route(source: string, target: string, weight: string | number = 100): ParsedCommand {
  return { action: 'route_traffic', source, target, weight: typeof weight === 'number' ? weight : parseInt(weight, 10) };
}

function detectMetric(command: string): ScalingMetric {
  if (command.includes('memory')) return 'memory';
  if (command.includes('disk')) return 'disk';
  if (command.includes('network')) return 'network';
  return 'cpu';
}

function scaling(match: RegExpMatchArray, command: string): ParsedCommand {
  const threshold = parseInt(match[match.length - 1], 10);
  const scaleAction: ScalingAction = /\b(down|decrease|below)\b/.test(command) ? 'scale_down' : 'scale_up';
  return { action: 'auto_scale', metric: detectMetric(command), threshold, scaleAction };
}

// Order matters: the first matching pattern wins
const RULES: Rule[] = [
  { pattern: /check health of (.+?) every (\d+) (seconds?|minutes?)/, build: health },
  { pattern: /monitor (.+?) health every (\d+)/, build: health },
  { pattern: /health check (.+?) interval (\d+)/, build: health },
  { pattern: /ping (.+?) every (\d+)/, build: health },
  { pattern: /watch (.+?) health/, build: health },
  { pattern: /monitor (.+)/, build: health },

  { pattern: /route (.+?) to (.+?) with (\d+)% traffic/, build: m => route(m[1], m[2], m[3]) },
  { pattern: /route (\d+)% (?:of )?traffic from (.+?) to (.+)/, build: m => route(m[2], m[3], m[1]) },
  { pattern: /send (\d+)% of traffic from (.+?) to (.+)/, build: m => route(m[2], m[3], m[1]) },
  { pattern: /redirect (.+?) to (.+?) at (\d+)%/, build: m => route(m[1], m[2], m[3]) },
  { pattern: /balance (\d+)% traffic from (.+?) to (.+)/, build: m => route(m[2], m[3], m[1]) },
  { pattern: /redirect (.+?) to (.+)/, build: m => route(m[1], m[2]) },
  { pattern: /balance traffic between (.+?) and (.+)/, build: m => route(m[1], m[2]) },
  { pattern: /failover (.+?) to (.+)/, build: m => route(m[1], m[2]) },

  { pattern: /scale up when cpu above (\d+)%/, build: scaling },
  { pattern: /scale down when cpu below (\d+)%/, build: scaling },
  { pattern: /auto scale (.+?) when (.+?) above (\d+)/, build: scaling },
  { pattern: /increase capacity when (.+?) above (\d+)/, build: scaling },
  { pattern: /decrease capacity when (.+?) below (\d+)/, build: scaling },
  { pattern: /scale when (.+?) threshold (\d+)/, build: scaling },

  { pattern: /status of (.+)/, build: m => ({ action: 'get_status', target: m[1] }) },
  { pattern: /show health of (.+)/, build: m => ({ action: 'get_status', target: m[1] }) },
  { pattern: /check (.+?) status/, build: m => ({ action: 'get_status', target: m[1] }) },
  { pattern: /how is (.+?) doing/, build: m => ({ action: 'get_status', target: m[1] }) },
  { pattern: /health report for (.+)/, build: m => ({ action: 'get_status', target: m[1] }) },
  { pattern: /show (.+?) metrics/, build: m => ({ action: 'get_status', target: m[1] }) },

  { pattern: /show status|system status|overall health|dashboard|summary/, build: () => ({ action: 'get_status' }) },
  { pattern: /help/, build: () => ({ action: 'help' }) },
  { pattern: /clear|reset/, build: () => ({ action: 'clear' }) }
];

/**
 * Turns a free-text instruction into a structured command. Matching is
 * case-insensitive; captured values are lower-cased.
 */
export function parseCommand(input: string): ParsedCommand {
  const command = input.toLowerCase().trim();

  for (const rule of RULES) {
    const match = command.match(rule.pattern);
    if (match) {
      return rule.build(match, command);
    }
  }

  return { action: 'unknown', command };
}
