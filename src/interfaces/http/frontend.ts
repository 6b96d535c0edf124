import fs from "fs";
import path from "path";
import express, { type Express } from "express";
import { isRpcPath } from "./classifier.js";

const NON_ASSET_PREFIXES = ["/api/", "/healthz"];

function isAssetPath(urlPath: string): boolean {
  return !isRpcPath(urlPath) && !NON_ASSET_PREFIXES.some((prefix) => urlPath.startsWith(prefix));
}

/**
 * Serve the built frontend from `publicDir`, falling back to index.html for
 * client-side routes. Does nothing when the directory has not been built.
 *
 * @returns whether the frontend was mounted
 */
export function serveFrontend(app: Express, publicDir: string): boolean {
  const indexFile = path.join(publicDir, "index.html");
  if (!fs.existsSync(indexFile)) return false;

  app.use(express.static(publicDir, { index: "index.html" }));
  app.get("*", (req, res, next) => {
    if (!isAssetPath(req.path)) return next();
    res.sendFile(indexFile);
  });
  return true;
}
