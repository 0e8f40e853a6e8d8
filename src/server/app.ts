import type { Server } from "http";
import express from "express";
import type { Collection } from "../content/collection";
import { findPostBySlug, getAllTags, getPostsByTag } from "../content/collection";
import { toSummary } from "../content/post";
import { errorMessage } from "../errors";
import { renderPost } from "../content/render";

export interface AppOptions {
  corsOrigin?: string;
}

export const createApp = (collection: Collection, options: AppOptions = {}): express.Express => {
  const app = express();
  const corsOrigin = options.corsOrigin ?? "*";

  app.use(express.json());
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", corsOrigin);
    res.header("Access-Control-Allow-Methods", "GET,HEAD,OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, Accept");
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", uptime: process.uptime(), posts: collection.posts.length });
  });

  app.get("/api/posts", (req, res) => {
    const tag = typeof req.query.tag === "string" ? req.query.tag : undefined;
    const posts = tag ? getPostsByTag(collection.posts, tag) : collection.posts;
    res.json(posts.map(toSummary));
  });

  app.get("/api/tags", (_req, res) => {
    res.json(getAllTags(collection.posts));
  });

  app.get("/api/posts/:slug", (req, res, next) => {
    const post = findPostBySlug(collection.posts, req.params.slug);

    if (!post) {
      res.status(404).json({ message: "Post not found" });
      return;
    }

    renderPost(post)
      .then(({ html, headings }) => {
        res.json({ ...toSummary(post), body: post.body, html, headings });
      })
      .catch(next);
  });

  app.use((req, res) => {
    res.status(404).json({ message: `No route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    res.status(500).json({ message: errorMessage(err) });
  });

  return app;
};

export const startServer = (app: express.Express, port: number, host = "0.0.0.0"): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      resolve(server);
    });
    server.once("error", reject);
  });
