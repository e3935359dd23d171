export {
  type ActionDeclaration,
  type ActionDeclarations,
  classToPrefix,
  Controller,
  INTERNAL_ACTIONS,
  type InternalAction,
  parseDeclaration,
} from './controller.js';
