import type { ActionHandler } from '../interfaces/action-handler';
import { setPropertyAction } from './set-property';
import { incrementPropertyAction } from './increment-property';
import { fireEventAction } from './fire-event';
import { setVariableAction } from './set-variable';

export { setPropertyAction, incrementPropertyAction, fireEventAction, setVariableAction };

/** Actions every engine registers by default */
export const builtinActions: readonly ActionHandler[] = [
  setPropertyAction,
  incrementPropertyAction,
  fireEventAction,
  setVariableAction,
];
