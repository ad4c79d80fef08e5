import { Request, Response, NextFunction } from "express";
import { ZodError, ZodTypeAny } from "zod";
import { sendError } from "../utils/response";

type Schemas = {
  body?: ZodTypeAny;
};

const describe = (error: ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );

export const validateRequest =
  (schemas: Schemas) => (req: Request, res: Response, next: NextFunction) => {
    if (schemas.body) {
      const parsed = schemas.body.safeParse(req.body ?? {});
      if (!parsed.success) {
        return sendError(res, "Invalid request body", 400, undefined, describe(parsed.error));
      }
      req.body = parsed.data;
    }

    return next();
  };
