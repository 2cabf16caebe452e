export {
  mapWithConcurrency,
  sleep,
  systemClock,
  uniqueInOrder,
  type Clock,
} from './concurrency';
