/**
 * Controller exports
 */

export {
  ALLOWED_METHODS,
  createObjectsController,
  type ObjectsController,
} from "./objects.ts";
