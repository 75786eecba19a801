export { createFileStore, loadTestCaseFile, toTestId, InvalidTestIdError } from './testCaseStore.js';
export type { TestCaseStore } from './testCaseStore.js';
