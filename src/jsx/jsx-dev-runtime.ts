/**
 * JSX dev runtime factory
 * Same element shape as production runtime, with room for dev warnings.
 */

import './types';
import { jsxDEV, Fragment } from './jsx-runtime';

export { jsxDEV, Fragment };
