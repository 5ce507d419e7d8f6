/**
 * Lezer grammars for the TypeScript and JavaScript language modes.
 */

import { parser as jsParser } from '@lezer/javascript';

export const typescriptParser = jsParser.configure({ dialect: 'ts' });

export const javascriptParser = jsParser;
