/**
 * Unit tests for the Docker Hub service
 */

import axios, { AxiosInstance } from 'axios';
import { HubService } from '../../../src/services/hub-service';
import { HubTagJson } from '../../../src/types/hub';
import { HubParseError, HubRequestError, ValidationError } from '../../../src/utils/errors';
import { ConsoleLogger, LogLevel } from '../../../src/utils/logger';

// Mock axios
jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

const BASE_URL = 'https://hub.test/v2';
const FIRST_PAGE = `${BASE_URL}/repositories/library/nginx/tags?page_size=2`;
const SECOND_PAGE = `${BASE_URL}/repositories/library/nginx/tags?page=2&page_size=2`;

const tag = (name: string, digest: string): HubTagJson => ({
    name,
    last_updated: '2024-01-01T00:00:00Z',
    tag_status: 'active',
    images: [{ architecture: 'amd64', os: 'linux', digest, status: 'active', last_pushed: '2024-01-01T00:00:00Z' }],
});

describe('Hub Service', () => {
    let mockAxiosInstance: { get: jest.Mock };
    let logWriter: jest.Mock;
    let service: HubService;

    beforeEach(() => {
        mockAxiosInstance = { get: jest.fn() };
        mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as AxiosInstance);

        logWriter = jest.fn();
        service = new HubService({
            baseUrl: BASE_URL,
            pageSize: 2,
            maxPages: 5,
            logger: new ConsoleLogger({ level: LogLevel.DEBUG, write: logWriter }),
        });
    });

    afterEach(() => {
        jest.clearAllMocks();
    });

    describe('constructor', () => {
        test('should configure the axios instance', () => {
            expect(mockedAxios.create).toHaveBeenCalledWith({
                timeout: 30000,
                headers: {
                    'User-Agent': 'hub-tags/1.0',
                    'Accept': 'application/json',
                },
            });
        });

        test('should pass a custom timeout through', () => {
            new HubService({ timeoutMs: 1234 });
            expect(mockedAxios.create).toHaveBeenLastCalledWith(expect.objectContaining({ timeout: 1234 }));
        });
    });

    describe('listTags', () => {
        test('should follow next links until the last page', async () => {
            mockAxiosInstance.get
                .mockResolvedValueOnce({
                    status: 200,
                    statusText: 'OK',
                    data: { count: 3, next: SECOND_PAGE, previous: null, results: [tag('1.25', 'sha256:a'), tag('1.25.3', 'sha256:a')] },
                })
                .mockResolvedValueOnce({
                    status: 200,
                    statusText: 'OK',
                    data: { count: 3, next: null, previous: FIRST_PAGE, results: [tag('latest', 'sha256:a')] },
                });

            const tags = await service.listTags('nginx');

            expect(tags.map((entry) => entry.name)).toEqual(['1.25', '1.25.3', 'latest']);
            expect(tags[0]?.images[0]?.digest).toBe('sha256:a');
            expect(mockAxiosInstance.get).toHaveBeenCalledTimes(2);
            expect(mockAxiosInstance.get).toHaveBeenNthCalledWith(1, FIRST_PAGE, { validateStatus: expect.any(Function) });
            expect(mockAxiosInstance.get).toHaveBeenNthCalledWith(2, SECOND_PAGE, { validateStatus: expect.any(Function) });
        });

        test('should only let server errors fail inside axios', async () => {
            mockAxiosInstance.get.mockResolvedValueOnce({ status: 200, statusText: 'OK', data: { next: null, results: [] } });

            await service.listTags('nginx');

            const options = mockAxiosInstance.get.mock.calls[0]?.[1];
            expect(options.validateStatus(404)).toBe(true);
            expect(options.validateStatus(503)).toBe(false);
        });

        test('should log each page at debug level', async () => {
            mockAxiosInstance.get.mockResolvedValueOnce({ status: 200, statusText: 'OK', data: { count: 0, next: null, results: [] } });

            await service.listTags('nginx');

            const lines: string[] = logWriter.mock.calls.map((call) => String(call[0]));
            expect(lines.some((line) => line.includes('DEBUG: Fetched tags page {"repository":"library/nginx","page":1,"tags":0,"total":0}'))).toBe(true);
            expect(lines.some((line) => line.includes('INFO: Fetched repository tags {"repository":"library/nginx","tags":0,"pages":1}'))).toBe(true);
        });

        test('should report a missing repository', async () => {
            mockAxiosInstance.get.mockResolvedValueOnce({ status: 404, statusText: 'Not Found', data: { message: 'object not found' } });

            const error = await service.listTags('nginx').catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(HubRequestError);
            expect(error).toMatchObject({
                message: 'Repository not found',
                statusCode: 404,
                url: FIRST_PAGE,
                code: 'hub_request_failed',
            });
        });

        test('should report other client errors with their status', async () => {
            mockAxiosInstance.get.mockResolvedValueOnce({ status: 429, statusText: 'Too Many Requests', data: {} });

            await expect(service.listTags('nginx')).rejects.toThrow('HTTP 429: Too Many Requests');
        });

        test('should wrap network failures', async () => {
            mockAxiosInstance.get.mockRejectedValueOnce(new Error('socket hang up'));

            const error = await service.listTags('nginx').catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(HubRequestError);
            expect(error).toMatchObject({
                message: 'Docker Hub request failed: socket hang up',
                url: FIRST_PAGE,
                code: 'hub_request_failed',
                cause: expect.objectContaining({ message: 'socket hang up' }),
            });
        });

        test('should keep the status of axios errors', async () => {
            const axiosError = Object.assign(new Error('Request failed with status code 503'), {
                isAxiosError: true,
                response: { status: 503 },
            });
            mockedAxios.isAxiosError.mockReturnValueOnce(true);
            mockAxiosInstance.get.mockRejectedValueOnce(axiosError);

            const error = await service.listTags('nginx').catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(HubRequestError);
            expect(error).toMatchObject({
                message: 'Docker Hub request failed: Request failed with status code 503',
                statusCode: 503,
            });
        });

        test('should reject a body that is not a tags page', async () => {
            mockAxiosInstance.get.mockResolvedValueOnce({ status: 200, statusText: 'OK', data: '<html></html>' });

            await expect(service.listTags('nginx')).rejects.toThrow(HubParseError);
        });

        test('should stop runaway pagination', async () => {
            const limited = new HubService({ baseUrl: BASE_URL, pageSize: 2, maxPages: 1 });
            mockAxiosInstance.get.mockResolvedValue({
                status: 200,
                statusText: 'OK',
                data: { next: SECOND_PAGE, results: [tag('1.0', 'sha256:a')] },
            });

            await expect(limited.listTags('nginx')).rejects.toThrow('Stopped after 1 pages of tags for library/nginx');
            expect(mockAxiosInstance.get).toHaveBeenCalledTimes(1);
        });

        test('should warn about image records without a digest', async () => {
            const partial: HubTagJson = {
                name: '1.0',
                images: [
                    { architecture: 'amd64', os: 'linux', digest: 'sha256:a' },
                    { architecture: 'arm64', os: 'linux' },
                ],
            };
            mockAxiosInstance.get.mockResolvedValueOnce({
                status: 200,
                statusText: 'OK',
                data: { count: 1, next: null, results: [partial] },
            });

            const tags = await service.listTags('nginx');

            expect(tags[0]?.images.map((image) => image.digest)).toEqual(['sha256:a']);
            expect(logWriter).toHaveBeenCalledWith(expect.stringMatching(
                / WARN: Skipped image records without a digest \{"repository":"library\/nginx","page":1,"skipped":1\}$/
            ));
        });

        test('should validate the repository before any request', async () => {
            await expect(service.listTags('not a repo')).rejects.toThrow(ValidationError);
            expect(mockAxiosInstance.get).not.toHaveBeenCalled();
        });
    });
});
