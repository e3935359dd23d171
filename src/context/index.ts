export { RequestContext } from './context.js';
export { DispatchRequest, type DispatchRequestOptions } from './request.js';
