import type { Response } from "express";
import { HTTP_STATUS } from "./constants.js";

export function sendError(res: Response, error: unknown, defaultMessage: string) {
  const message = error instanceof Error ? error.message : String(error);
  res.status(HTTP_STATUS.INTERNAL_ERROR).json({ error: message || defaultMessage });
}

export function sendNotFound(res: Response, message: string) {
  res.status(HTTP_STATUS.NOT_FOUND).json({ error: message });
}

export function sendSuccess(res: Response, data: unknown) {
  res.status(HTTP_STATUS.OK).json(data);
}
