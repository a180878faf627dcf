/**
 * DelegateSkill — передача задачи специализированному под-агенту (delegate_task).
 */

import type { AgentSpawner } from '../../ai/agent-spawner.js';
import type { CapabilityArgs, Skill, ToolDefinition } from '../types.js';

export class DelegateSkill implements Skill {
  readonly id = 'delegate';
  readonly name = 'Delegation';
  readonly description = 'Delegate focused missions to role-restricted sub-agents';

  constructor(private readonly spawner: AgentSpawner) {}

  getTools(): ToolDefinition[] {
    return [
      {
        name: 'delegate_task',
        description:
          'Delegate a self-contained mission to a specialised sub-agent and return its report. ' +
          `Available roles: ${this.spawner.availableRoles().join(', ')}.`,
        parameters: {
          type: 'object',
          properties: {
            role: { type: 'string', description: 'Sub-agent role id' },
            mission: { type: 'string', description: 'What the sub-agent must do, in plain language' },
            context: { type: 'string', description: 'Short summary of the recent conversation (optional)' },
          },
          required: ['role', 'mission'],
        },
      },
    ];
  }

  async execute(toolName: string, args: CapabilityArgs): Promise<string> {
    if (toolName !== 'delegate_task') {
      return `Unknown tool in DelegateSkill: ${toolName}`;
    }
    const role = typeof args.role === 'string' ? args.role : String(args.role ?? '');
    const mission = typeof args.mission === 'string' ? args.mission : String(args.mission ?? '');
    const context = typeof args.context === 'string' ? args.context : undefined;
    if (!mission.trim()) return 'Error: mission must not be empty';
    return this.spawner.spawn(role, mission, context);
  }
}
