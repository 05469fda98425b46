import { connectionSchema } from './connectionSchema';
import { panelSchema } from './panelSchema';

export const allSchemas = [panelSchema, connectionSchema];
