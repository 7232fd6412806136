export { TitleApiClient, type SessionApi, type ConversationApi } from './title-api.js';
export { organizationSchema, organizationListSchema, titleResponseSchema } from './schemas.js';
