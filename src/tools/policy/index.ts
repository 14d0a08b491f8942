export { CheckPolicyViolationsTool } from './CheckPolicyViolationsTool.js';
export { ListConstraintsTool } from './ListConstraintsTool.js';
