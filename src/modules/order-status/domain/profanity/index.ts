export { containsProfanity } from './detect';
