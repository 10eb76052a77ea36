export { AppError } from './AppError';
export { classifyFailure, type ClassifiedFailure, type FailureKind } from './classifyFailure';
