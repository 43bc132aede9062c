import express from "express";
import type { Server } from "node:http";

export interface ServerOptions {
  /** Telegram webhook mounted at `POST <path>/<token>`. */
  webhook?: {
    path: string;
    token: string;
    handler: express.RequestHandler;
  };
}

export function createApp(options: ServerOptions = {}): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const { webhook } = options;
  if (webhook) {
    const checkToken: express.RequestHandler = (req, res, next) => {
      if (req.params.token !== webhook.token) {
        res.status(403).json({ error: "Invalid token in URL" });
        return;
      }
      next();
    };
    app.post(`${webhook.path}/:token`, checkToken, webhook.handler);
  }

  return app;
}

export function startServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      console.log(`[SERVER] Listening on http://${host}:${port}`);
      resolve(server);
    });
    server.once("error", reject);
  });
}
