import axios, { isAxiosError } from 'axios';
import { apiErrorSchema, healthStatusSchema, type HealthStatus, type RejectionReason } from '@/types/api';

export const ACCEPTED_TYPES = ['image/jpeg', 'image/png'];

export const apiClient = axios.create({ timeout: 120_000 });

export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly reason?: RejectionReason
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

// Blob responses carry their JSON error body as a Blob too.
const readErrorBody = async (data: unknown): Promise<unknown> => {
  if (!(data instanceof Blob)) {
    return data;
  }
  const text = await data.text();
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
};

export const toApiError = async (error: unknown): Promise<ApiRequestError> => {
  if (!isAxiosError(error)) {
    return new ApiRequestError(error instanceof Error ? error.message : 'Unexpected error');
  }
  const status = error.response?.status;
  if (!error.response) {
    return new ApiRequestError('Service unreachable');
  }
  const body = apiErrorSchema.safeParse(await readErrorBody(error.response.data));
  if (body.success) {
    return new ApiRequestError(body.data.message, status, body.data.reason);
  }
  return new ApiRequestError(`Request failed with status ${status}`, status);
};

export const removeBackground = async (file: File): Promise<Blob> => {
  const formData = new FormData();
  formData.append('file', file, file.name);
  try {
    const { data } = await apiClient.post<Blob>('/api/remove-bg', formData, { responseType: 'blob' });
    return data;
  } catch (error) {
    throw await toApiError(error);
  }
};

export const fetchHealth = async (): Promise<HealthStatus> => {
  try {
    const { data } = await apiClient.get<unknown>('/health');
    return healthStatusSchema.parse(data);
  } catch (error) {
    throw await toApiError(error);
  }
};
