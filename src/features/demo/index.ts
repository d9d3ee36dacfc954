export { runDemo, type DemoOptions } from './runDemo.js';
