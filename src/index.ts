export { DatabaseConnection, openDatabase } from './database/connection';
export { DbSession, withDbSession, withTransaction } from './database/transaction';
export type { ScopeOptions } from './database/transaction';
export {
  LibraryPanelDashboardNotFoundError,
  LibraryPanelError,
  LibraryPanelExistsError,
  LibraryPanelInvariantError,
  LibraryPanelNotFoundError,
  isUniqueConstraintViolation,
} from './errors';
export type * from './models/types';
export { ConnectionRepository } from './services/ConnectionRepository';
export { LibraryPanelService } from './services/LibraryPanelService';
export type { LibraryPanelServiceOptions } from './services/LibraryPanelService';
export { PanelRepository } from './services/PanelRepository';
export { generateShortUid } from './utils/uid';
export type { UidGenerator } from './utils/uid';
