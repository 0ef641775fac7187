export { RatingService, type RatingServiceOptions } from './RatingService.js';
