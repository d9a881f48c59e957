export {
  LifecycleController,
  InvocationCancelledError,
  type LifecycleOptions,
  type LifecycleEvents,
  type SignalSource,
} from './controller.js';
