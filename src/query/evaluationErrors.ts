// src/query/evaluationErrors.ts
import { EvaluationError } from '../errors/errors.ts';

export function failUnsupportedNode(nodeType: string): never {
  throw new EvaluationError(`Unsupported expression node '${nodeType}'.`, nodeType, 'E_EVAL_UNSUPPORTED_NODE');
}
