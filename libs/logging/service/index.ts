export { ContextStore } from './context-store.service';
export { RequestInstrumentation } from './request-instrumentation.service';
export {
  InstrumentedAsyncStream,
  InstrumentedStream,
} from './instrumented-stream';
