import { Request, Response } from 'express';

export type ResourceRequest = Pick<Request, 'protocol' | 'get'>;

export type ResourceResponse = Pick<Response, 'location'>;

/**
 * 生成新建资源的绝对地址，写入 201 响应的 Location 头
 * 例：http://localhost:8080/api/v1/jobs/12
 */
export function buildResourceLocation(
  request: ResourceRequest,
  resource: string,
  id: number,
): string {
  return `${request.protocol}://${request.get('host') ?? 'localhost'}/api/v1/${resource}/${id}`;
}
