export { httpErrorHandler } from './errorHandler.js';
export { createSlackAuthentication, type SlackAuthentication } from './slackAuthentication.js';
