import { BadRequestException, HttpException, HttpStatus } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { StoreUnavailableException } from '@core/database';
import { HttpExceptionFilter } from './http-exception.filter';

describe('HttpExceptionFilter', () => {
  const filter = new HttpExceptionFilter();

  const response = {
    status: jest.fn().mockReturnThis(),
    json: jest.fn(),
  };
  const request = { method: 'POST', url: '/api/v1/jobs' };
  const host = new ExecutionContextHost([request, response]);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should keep the code and details of a business exception', () => {
    const exception = new HttpException(
      {
        code: 'FAILED_PRECONDITION',
        message: 'Location with ID 7 does not exist.',
        details: { reasons: ['Location with ID 7 does not exist.'] },
      },
      HttpStatus.BAD_REQUEST,
    );

    filter.catch(exception, host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      success: false,
      error: {
        code: 'FAILED_PRECONDITION',
        message: 'Location with ID 7 does not exist.',
        details: { reasons: ['Location with ID 7 does not exist.'] },
      },
      timestamp: expect.any(String),
      path: '/api/v1/jobs',
    });
  });

  it('should render validation errors as a single message with the list in details', () => {
    filter.catch(new BadRequestException(['title should not be empty']), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        error: {
          code: 'BAD_REQUEST',
          message: 'Validation failed',
          details: { validationErrors: ['title should not be empty'] },
        },
      }),
    );
  });

  it('should map a store outage to 503', () => {
    filter.catch(new StoreUnavailableException(), host);

    expect(response.status).toHaveBeenCalledWith(503);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        error: { code: 'STORE_UNAVAILABLE', message: 'Catalog store is unavailable.' },
      }),
    );
  });

  it('should map unknown errors to 500', () => {
    filter.catch(new Error('boom'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith(
      expect.objectContaining({
        error: expect.objectContaining({ code: 'INTERNAL_SERVER_ERROR', message: 'boom' }),
      }),
    );
  });
});
