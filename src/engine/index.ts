export {
  type EventLoopConfig,
  type EventLoopStats,
  type EventObserver,
  type EventLoop,
  createEventLoop,
} from './eventLoop';
