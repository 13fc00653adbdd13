export {
  normalJump,
  uniformJump,
  studentTJump,
  fixedJump,
  bindJump,
} from './jumps';
