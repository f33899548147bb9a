import { ParsedCommand } from './command-parser';
import { TrafficController } from '../controller/traffic-controller';

export const COMMAND_EXAMPLES = [
  'check health of https://myapp.com every 30 seconds',
  'route 70% traffic from old-server to new-server',
  'scale up when cpu above 80%',
  'show status of myapp.com',
  'show status (for overall system)',
  'clear (to reset all configurations)'
];

export const COMMAND_SUGGESTIONS = [
  'check health of <url> every <seconds> seconds',
  'route <source> to <target> with <percentage>% traffic',
  'scale up when cpu above <percentage>%',
  'show status [of <target>]',
  'help - show available commands'
];

/**
 * Executes a parsed command against the controller's public API
 */
export function dispatchCommand(controller: TrafficController, parsed: ParsedCommand): object {
  switch (parsed.action) {
    case 'health_check':
      return controller.registerEndpoint(parsed.endpoint, parsed.interval);
    case 'route_traffic':
      return controller.addTrafficRule(parsed.source, parsed.target, parsed.weight);
    case 'auto_scale':
      return controller.addAutoScaleRule(parsed.metric, parsed.threshold, parsed.scaleAction);
    case 'get_status':
      return parsed.target !== undefined ? controller.getStatus(parsed.target) : controller.getStatus();
    case 'clear':
      return controller.clearAll();
    case 'help':
      return { status: 'success', message: 'Available commands', examples: COMMAND_EXAMPLES };
    case 'unknown':
      return {
        status: 'error',
        message: `I don't understand: '${parsed.command}'`,
        suggestions: COMMAND_SUGGESTIONS
      };
  }
}
