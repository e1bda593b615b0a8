import { Request, Response, NextFunction } from "express";

type FieldType = "string" | "boolean" | "amount";

export interface FieldSpec {
  name: string;
  type: FieldType;
  optional?: boolean;
}

const AMOUNT_PATTERN = /^\d+(\.\d+)?$/;

const matches = (type: FieldType, value: unknown): boolean => {
  switch (type) {
    case "string":
      return typeof value === "string" && value.trim().length > 0;
    case "boolean":
      return typeof value === "boolean";
    case "amount":
      return typeof value === "string" && AMOUNT_PATTERN.test(value.trim());
  }
};

const expectation: Record<FieldType, string> = {
  string: "non-empty string",
  boolean: "boolean",
  amount: 'decimal string such as "100.5"',
};

export const validateFields =
  (fields: FieldSpec[]) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const body: Record<string, unknown> = typeof req.body === "object" && req.body !== null ? req.body : {};
    for (const field of fields) {
      const value = body[field.name];
      if (value === undefined || value === null) {
        if (field.optional) continue;
        res.status(400).json({
          success: false,
          code: "VALIDATION_ERROR",
          message: `Missing required field: ${field.name}`,
        });
        return;
      }
      if (!matches(field.type, value)) {
        res.status(400).json({
          success: false,
          code: "VALIDATION_ERROR",
          message: `Invalid type for field ${field.name}: expected ${expectation[field.type]}`,
        });
        return;
      }
    }
    next();
  };
