/**
 * PluginAdminSkill — управление плагинами из диалога: список, перезагрузка, установка.
 */

import type { PluginHost } from '../../plugins/host.js';
import type { CapabilityArgs, Skill, ToolDefinition } from '../types.js';

export class PluginAdminSkill implements Skill {
  readonly id = 'plugins';
  readonly name = 'Plugin Admin';
  readonly description = 'List, reload and install plugins';

  constructor(private readonly host: PluginHost) {}

  getTools(): ToolDefinition[] {
    return [
      {
        name: 'plugin_list',
        description: 'List installed plugins with their version, actions and readiness.',
        parameters: { type: 'object', properties: {} },
      },
      {
        name: 'plugin_reload',
        description: 'Reload one plugin from disk, or all plugins (and pick up new files) when no name is given.',
        parameters: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'Plugin name (omit to reload all)' },
          },
        },
      },
      {
        name: 'plugin_install',
        description: 'Download a plugin (.mjs/.js) from a URL, e.g. a GitHub file link, and load it.',
        parameters: {
          type: 'object',
          properties: {
            url: { type: 'string', description: 'URL of the plugin file' },
          },
          required: ['url'],
        },
      },
    ];
  }

  async execute(toolName: string, args: CapabilityArgs): Promise<string> {
    switch (toolName) {
      case 'plugin_list':
        return this.formatList();

      case 'plugin_reload': {
        const name = typeof args.name === 'string' ? args.name.trim() : '';
        return name ? this.host.reload(name) : this.host.reloadAll();
      }

      case 'plugin_install': {
        const url = typeof args.url === 'string' ? args.url.trim() : '';
        if (!url) return 'Error: url is required';
        return this.host.installFromUrl(url);
      }

      default:
        return `Unknown tool in PluginAdminSkill: ${toolName}`;
    }
  }

  private formatList(): string {
    const plugins = this.host.listPlugins();
    if (plugins.length === 0) return 'No plugins installed.';
    return plugins
      .map(p => {
        const actions = p.actions.length > 0 ? ` actions: ${p.actions.join(', ')}` : '';
        const tools = p.tools.length > 0 ? ` tools: ${p.tools.join(', ')}` : '';
        const missing = p.missingEnv.length > 0 ? ` (missing env: ${p.missingEnv.join(', ')})` : '';
        return `${p.status} ${p.name} v${p.version}: ${p.description || p.displayName}${actions}${tools}${missing}`;
      })
      .join('\n');
  }
}
