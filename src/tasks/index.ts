/**
 * Tasks Module
 *
 * @module tasks
 */

export { createTask, parseTaskInput, withStatus, type ParsedTaskInput } from './task.js';
