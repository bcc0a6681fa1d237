import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import { ContactContext, ContactContextLookup } from '../../core/types';

export interface HttpContactContextConfig {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

interface ContactContextPayload {
  contactId: string;
  organizationId: string;
  contactName?: string;
  contactStatus?: string;
  relationshipStage?: string;
  dealStatus?: string;
  engagementLevel?: string;
  sentimentScore?: number;
  lastInteractionAt?: string;
  interactionSummary?: string;
  customProperties?: Record<string, unknown>;
}

/** Reads contact context from the CRM service. A 404 means "no context". */
export class HttpContactContextLookup implements ContactContextLookup {
  private client: AxiosInstance;

  constructor(config: HttpContactContextConfig) {
    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? 10000,
      adapter: config.adapter,
      headers: {
        Accept: 'application/json',
        ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
      },
    });
  }

  async getContactContext(contactId: string, organizationId: string, signal?: AbortSignal): Promise<ContactContext | undefined> {
    try {
      const response = await this.client.get<ContactContextPayload>(
        `/contacts/${encodeURIComponent(contactId)}/context`,
        { params: { organizationId }, signal },
      );
      return toContactContext(response.data);
    } catch (error) {
      if (isAxiosError(error) && error.response?.status === 404) {
        return undefined;
      }
      throw error;
    }
  }
}

function toContactContext(payload: ContactContextPayload): ContactContext {
  return {
    contactId: payload.contactId,
    organizationId: payload.organizationId,
    contactName: payload.contactName,
    contactStatus: payload.contactStatus,
    relationshipStage: payload.relationshipStage,
    dealStatus: payload.dealStatus,
    engagementLevel: payload.engagementLevel,
    sentimentScore: payload.sentimentScore,
    lastInteractionAt: payload.lastInteractionAt ? new Date(payload.lastInteractionAt) : undefined,
    interactionSummary: payload.interactionSummary,
    customProperties: payload.customProperties ?? {},
    retrievedAt: new Date(),
  };
}
