// Mock process.exit to prevent tests from terminating
const mockExit = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null): never => {
  throw new Error(`process.exit called with ${code}`);
});

beforeEach(() => {
  jest.clearAllMocks();
  mockExit.mockClear();
});
