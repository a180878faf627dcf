/**
 * agent-spawner.ts — эфемерные под-агенты.
 *
 * Под-агент = тот же tool-loop под другой ролью: свои инструкции,
 * только разрешённые capability. Результат оборачивается в блок с именем роли.
 */

import type { RoleCatalog } from '../config/roles.js';
import type { ToolLoop } from './tool-loop.js';

const RULE = '─'.repeat(40);

export function wrapAgentResult(displayName: string, result: string): string {
  return `[${displayName.toUpperCase()}]\n${RULE}\n${result}\n${RULE}`;
}

export class AgentSpawner {
  constructor(
    private readonly loop: ToolLoop,
    private readonly roles: RoleCatalog,
  ) {}

  availableRoles(): string[] {
    return this.roles.ids();
  }

  /** Неизвестная роль — строка-ошибка со списком ролей; ошибки модели пробрасываются */
  async spawn(roleId: string, mission: string, context?: string): Promise<string> {
    const role = this.roles.get(roleId);
    if (!role) {
      return `Error: agent role '${roleId}' does not exist. Available roles: ${this.availableRoles().join(', ')}`;
    }

    const displayName = role.displayName ?? role.id;
    console.log(`🤖 [spawner] agent_spawned role=${role.id} mission="${mission.slice(0, 80)}"`);
    const result = await this.loop.run(role, mission, context);
    console.log(`[spawner] agent_finished role=${role.id}`);
    return wrapAgentResult(displayName, result);
  }
}
