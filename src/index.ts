import type { Server } from 'http';
import { AgentSpawner } from './ai/agent-spawner.js';
import { createChatModel } from './ai/openai-client.js';
import { ToolLoop } from './ai/tool-loop.js';
import { Dispatcher } from './channels/dispatcher.js';
import { ChannelRegistry } from './channels/registry.js';
import { WebChannel } from './channels/web/index.js';
import { config, getModelConfig } from './config/config.js';
import { RoleCatalog } from './config/roles.js';
import { PluginHost } from './plugins/host.js';
import { LaneQueue } from './queue/lane-queue.js';
import { WriteAheadStore } from './queue/store.js';
import { DelegateSkill } from './skills/delegate/index.js';
import { PluginAdminSkill } from './skills/plugins/index.js';
import { CapabilityRegistry } from './skills/registry.js';
import { startWebServer } from './server/web.js';

const channels = new ChannelRegistry();
let server: Server | null = null;
let queue: LaneQueue | null = null;

async function main() {
  console.log('🚀 Запуск Lane Agent...\n');

  const modelConfig = getModelConfig();
  console.log('📋 Конфигурация:');
  console.log(`   OpenRouter API Key: ${config.ai.openrouterKey ? '✅ Установлен' : '❌ Не установлен'}`);
  console.log(`   Модель: ${config.ai.model} (${modelConfig.model})`);
  console.log(`   Очередь: ${config.queue.waqDir}`);
  console.log(`   Плагины: ${config.plugins.dir}`);

  console.log(`\n🔒 Безопасность:`);
  console.log(`   Web API: ${config.security.adminToken ? '✅ Защищен (ADMIN_TOKEN задан)' : '⛔ Заблокирован (ADMIN_TOKEN не задан)'}`);

  // Роли
  const roles = new RoleCatalog();
  const customRoles = roles.loadCustomRoles(config.roles.storePath);
  console.log(`\n🎭 Роли: ${roles.ids().join(', ')}${customRoles ? ` (+${customRoles} из ${config.roles.storePath})` : ''}`);

  // Capability: навыки, затем плагины
  const registry = new CapabilityRegistry();
  const model = createChatModel(modelConfig);
  if (model) {
    const spawner = new AgentSpawner(new ToolLoop({ model, registry }), roles);
    registry.registerSkill(new DelegateSkill(spawner));
  }
  const plugins = new PluginHost({ registry });
  registry.registerSkill(new PluginAdminSkill(plugins));
  await plugins.discover();
  console.log(`\n🔧 Capabilities: ${registry.names().join(', ') || 'нет'}\n`);

  // Очередь и восстановление незавершённых сообщений
  const lanes = new LaneQueue(new WriteAheadStore(config.queue.waqDir));
  queue = lanes;
  const dispatcher = new Dispatcher({ queue: lanes, model, registry, roles });

  try {
    const web = new WebChannel();
    channels.register(web);

    // Сироты встают в полосы раньше любого нового сообщения
    const recovered = dispatcher.recover(laneId => channels.resultHandlerFor(laneId));
    if (recovered > 0) {
      console.log(`♻️ Восстановлено незавершённых сообщений: ${recovered}`);
    }

    server = await startWebServer({ queue: lanes, registry, plugins, dispatcher, web });
    await channels.startAll();

    console.log('\n✅ Все сервисы запущены!\n');
  } catch (error) {
    console.error('❌ Ошибка запуска:', error);
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown() {
  console.log('\n⏹️ Остановка сервисов...');
  server?.close();
  if (queue && !(await queue.whenIdleWithin(config.queue.shutdownTimeoutMs))) {
    console.warn('⚠️ Очередь не опустела к сроку, незавершённые элементы будут восстановлены при старте');
  }
  await channels.stopAll();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch(console.error);
