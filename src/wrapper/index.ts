export { ApplicationWrapper, createWrapper, type ApplicationWrapperOptions } from './application-wrapper';
