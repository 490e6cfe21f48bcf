export {
    decide,
    MAX_ATTEMPTS,
    CONFIDENCE_THRESHOLD,
    DEFAULT_ROUTER_OPTIONS,
    type RouterAction,
    type RouterOptions,
    type RoutingView,
} from './router';
