// Global test setup

jest.setTimeout(10000);

// Keep log lines out of the test report; assertions go through LoggerMock or spies
beforeEach(() => {
  jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  jest.restoreAllMocks();
});
