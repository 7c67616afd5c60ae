/**
 * Resource Managers
 */

export { BaseManager } from './base';
export { MediaManager } from './media';
export { MediaObjectManager } from './media-object';
export { AttributeManager } from './attribute';
export { SubsetManager } from './subset';
