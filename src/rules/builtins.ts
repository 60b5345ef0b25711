import { z } from 'zod';
import builtinTable from './data/python-builtins.json';

const BUILTIN_TABLE_SCHEMA = z.object({
  dialect: z.string(),
  names: z.array(z.string()).min(1),
});

const TABLE = BUILTIN_TABLE_SCHEMA.parse(builtinTable);

/** Names bound in the builtins module of the supported Python dialect. */
export const PYTHON_BUILTINS: ReadonlySet<string> = new Set(TABLE.names);
