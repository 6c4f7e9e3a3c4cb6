export { PermissionEvaluator } from './evaluator.js';
