export { Unit } from './Unit';
