/**
 * @shipkit/deployment
 *
 * App Store Connect client for the media engine
 */

export { AppStoreConnectService } from './services/app-store-connect.js';
export type {
  ASCCredentials,
  ASCLocalization,
  ASCServiceOptions,
} from './services/types.js';
