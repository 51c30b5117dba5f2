export { generateRequestId } from './generateRequestId.js';
export { isValidRequestId } from './isValidRequestId.js';
