/**
 * Execution Module
 *
 * Market order fill simulation against normalized books.
 */

export { simulateFill, getBookTop, getSideDepthNotional } from './slippage.js';
