import express from 'express';
import type { Server } from 'http';
import { createApiRouter, type ApiDeps } from './api.js';
import { config } from '../config/config.js';

export function createWebServer(deps: ApiDeps) {
  const app = express();

  app.use(express.json());

  // Проверка живости (вне auth middleware)
  app.get('/health', (req, res) => {
    res.json({ ok: true });
  });

  // API routes
  app.use(createApiRouter(deps));

  return app;
}

export function startWebServer(deps: ApiDeps): Promise<Server> {
  const app = createWebServer(deps);

  return new Promise((resolve) => {
    const server = app.listen(config.server.port, config.server.host, () => {
      console.log(`🌐 Веб-сервер запущен:`);
      console.log(`   Локально: http://localhost:${config.server.port}`);
      if (config.server.host === '0.0.0.0') {
        console.log(`   В сети: http://<ваш-ip>:${config.server.port}`);
      } else {
        console.log(`   💡 Только с этого ПК (HOST=${config.server.host})`);
      }
      resolve(server);
    });
  });
}
