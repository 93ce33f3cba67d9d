export { LegacyToken } from './legacy-token.service';
export { LegacyController } from './legacy.controller';
export { createLegacyRoutes } from './legacy.routes';
