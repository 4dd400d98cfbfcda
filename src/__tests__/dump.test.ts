import { PassThrough } from 'stream';
import { dump } from '../dump';
import { connectDB, disconnectDB } from '../lib/mongo';
import { exportLatestStarCounts } from '../modules/repos/repos.export';

jest.mock('../lib/mongo', () => ({
  connectDB: jest.fn(async () => undefined),
  disconnectDB: jest.fn(async () => undefined),
}));

jest.mock('../modules/repos/repos.export', () => ({
  exportLatestStarCounts: jest.fn(async () => 3),
}));

jest.mock('../modules/repos/repos.repository', () => ({
  repoStorage: { streamLatestStarCounts: jest.fn() },
}));

describe('dump', () => {
  beforeEach(() => {
    jest.mocked(connectDB).mockClear();
    jest.mocked(disconnectDB).mockClear();
  });

  it('should not start an export when imported', () => {
    expect(connectDB).not.toHaveBeenCalled();
    expect(exportLatestStarCounts).not.toHaveBeenCalled();
  });

  it('should export to the named output and disconnect', async () => {
    const output = new PassThrough();
    const openOutput = jest.fn((_file: string) => output);

    const rows = await dump('stars.csv', openOutput);

    expect(rows).toBe(3);
    expect(openOutput).toHaveBeenCalledWith('stars.csv');
    expect(exportLatestStarCounts).toHaveBeenCalledWith(undefined, output);
    expect(connectDB).toHaveBeenCalledTimes(1);
    expect(disconnectDB).toHaveBeenCalledTimes(1);
  });

  it('should disconnect when the export fails', async () => {
    jest.mocked(exportLatestStarCounts).mockRejectedValueOnce(new Error('cursor killed'));

    await expect(dump('stars.csv', () => new PassThrough())).rejects.toThrow('cursor killed');
    expect(disconnectDB).toHaveBeenCalledTimes(1);
  });
});
