/**
 * AWS client
 */

export {
  AwsClient,
  DEFAULT_STORAGE_CLASS,
  createClientFromEnv,
  type AwsClientOptions,
  type Clock,
  type UploadPayload,
} from './client.js';
export { AwsResponse } from './response.js';
