import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';

export interface FieldProblem {
  field: string;
  message: string;
}

/** Runs the chains (sanitizers included) and answers 400 with one entry per bad field. */
export function validate(validations: ValidationChain[]) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details: FieldProblem[] = errors.array({ onlyFirstError: true }).map((e) => ({
      field: e.type === 'field' ? e.path : e.type,
      message: String(e.msg),
    }));
    res.status(400).json({ error: 'Validation failed', details });
  };
}
