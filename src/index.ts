export { run } from '@oclif/command';
