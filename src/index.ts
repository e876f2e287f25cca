import { Sequence } from './collections/Sequence';
import { EventNotifier } from './composition/EventNotification';
import * as Functions from './functions/Functions';
import * as Predicates from './functions/Predicates';
import * as Iterables from './utils/IterableHelper';
import {
  ConcurrentModification,
  IndexOutOfBounds,
  InvalidArgument,
  UnsupportedOperation,
} from './utils/errors';
import { AbstractView } from './views/AbstractView';
import { FilteredView } from './views/FilteredView';
import { MappedView } from './views/MappedView';

export type { Mutation, SequenceEvents, SequenceOptions } from './collections/Sequence';
export type { EventHandler, EventMap } from './composition/EventNotification';
export type { Predicate, Transform } from './functions/types';
export type { FilteredViewOptions } from './views/FilteredView';
export type { MappedViewOptions } from './views/MappedView';
export type { View } from './views/View';

export {
  Sequence,
  AbstractView,
  FilteredView,
  MappedView,
  EventNotifier,
  Functions,
  Predicates,
  Iterables,
  ConcurrentModification,
  IndexOutOfBounds,
  InvalidArgument,
  UnsupportedOperation,
};
