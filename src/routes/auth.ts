import type { NextFunction, Request, Response } from "express";
import { maskApiKey, safeWarn } from "../utils/logging";

/** Rejects requests without the configured `x-api-key`. An empty key disables the check. */
export function requireApiKey(expectedKey: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expectedKey) return next();
    const provided = req.header("x-api-key");
    if (provided === expectedKey) return next();

    safeWarn(`[AUTH] rejected ${req.method} ${req.path} with key ${maskApiKey(provided)}`);
    return res.status(401).json({ status: "error", reply: "", detail: "Invalid or missing API key" });
  };
}
