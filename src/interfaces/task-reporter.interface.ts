/**
 * The slice of a listr2 task wrapper the steps write progress to.
 */
export interface TaskReporter {
  title: string;
  output: string;
  skip(message?: string): void;
}
