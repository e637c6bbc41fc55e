/**
 * Context Items
 *
 * Reference material attached to tasks and handed to every stage.
 *
 * @module context
 */

export {
  contentTypeFromPath,
  createContextItem,
  FileContextProvider,
  InMemoryContextProvider,
} from './provider.js';
