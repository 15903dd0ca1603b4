/**
 * @module @cmdbridge/client
 *
 * Promise-based host client for a bridge runtime.
 */

export {
  BridgeClient,
  PluginClient,
  type BridgeClientOptions,
  type CommandCaller,
} from './client.js';
export {
  Channel,
  ChannelRegistry,
  type ChannelListener,
  type ChannelRegistryOptions,
} from './channels.js';
export { PendingCalls, type PendingCallHandler } from './pending-calls.js';
export {
  PluginInvokeError,
  InvokeRejectedError,
  CannotDeserializeResponseError,
  CannotSerializePayloadError,
  isPluginInvokeError,
  type PluginInvokeErrorCode,
} from './errors.js';
