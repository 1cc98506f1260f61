/**
 * Evaluator
 * Class and extension registration
 *
 * @internal
 */

export { Evaluator } from './evaluator.js';

// Import extension modules to register prototype methods on Evaluator.
// These must be imported AFTER evaluator.js to ensure the class is defined.
import './statements.js';
import './expressions.js';
import './calls.js';
