/**
 * Pod management.
 */

import { z } from 'zod';
import { MessageResponseSchema } from '../transport';
import type { PodInfo, PodList, SharedPodInfo } from '../types';
import { DomainService, ServiceContext } from './base';

const ShareResponseSchema = z.object({ pod_sharing_reference: z.string() });

const PresentResponseSchema = z.object({ present: z.boolean() });

const ListResponseSchema = z.object({
  pod_name: z.array(z.string()).nullable(),
  shared_pod_name: z.array(z.string()).nullable(),
});

const StatResponseSchema = z.object({
  pod_name: z.string(),
  address: z.string(),
});

const ReceiveInfoResponseSchema = z.object({
  pod_name: z.string(),
  pod_address: z.string(),
  user_name: z.string(),
  user_address: z.string(),
  shared_time: z.string(),
});

/**
 * Pod service interface. Every call acts on behalf of a logged-in user.
 */
export interface PodService {
  create(username: string, pod: string, password: string): Promise<void>;
  open(username: string, pod: string, password: string): Promise<void>;
  sync(username: string, pod: string): Promise<void>;
  close(username: string, pod: string): Promise<void>;
  /**
   * Shares a pod. Resolves the sharing reference.
   */
  share(username: string, pod: string, password: string): Promise<string>;
  delete(username: string, pod: string, password: string): Promise<void>;
  exists(username: string, pod: string): Promise<boolean>;
  list(username: string): Promise<PodList>;
  info(username: string, pod: string): Promise<PodInfo>;
  receiveShared(username: string, reference: string): Promise<void>;
  sharedInfo(username: string, reference: string): Promise<SharedPodInfo>;
}

/**
 * Default pod service implementation.
 */
export class DefaultPodService extends DomainService implements PodService {
  constructor(context: ServiceContext) {
    super('pod', context);
  }

  async create(username: string, pod: string, password: string): Promise<void> {
    await this.postMessage(username, '/pod/new', { pod_name: pod, password });
  }

  async open(username: string, pod: string, password: string): Promise<void> {
    await this.postMessage(username, '/pod/open', { pod_name: pod, password });
  }

  async sync(username: string, pod: string): Promise<void> {
    await this.postMessage(username, '/pod/sync', { pod_name: pod });
  }

  async close(username: string, pod: string): Promise<void> {
    await this.postMessage(username, '/pod/close', { pod_name: pod });
  }

  async share(username: string, pod: string, password: string): Promise<string> {
    const token = this.tokenFor(username);
    const { data } = await this.call(() =>
      this.executor.post('/pod/share', { pod_name: pod, password }, ShareResponseSchema, { token })
    );
    return data.pod_sharing_reference;
  }

  async delete(username: string, pod: string, password: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.delete('/pod/delete', { pod_name: pod, password }, MessageResponseSchema, {
        token,
      })
    );
  }

  async exists(username: string, pod: string): Promise<boolean> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/pod/present', { pod_name: pod }, PresentResponseSchema, { token })
    );
    return res.present;
  }

  async list(username: string): Promise<PodList> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/pod/ls', {}, ListResponseSchema, { token })
    );
    return { pods: res.pod_name ?? [], sharedPods: res.shared_pod_name ?? [] };
  }

  async info(username: string, pod: string): Promise<PodInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/pod/stat', { pod_name: pod }, StatResponseSchema, { token })
    );
    return { name: res.pod_name, address: res.address };
  }

  async receiveShared(username: string, reference: string): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() =>
      this.executor.get('/pod/receive', { sharing_ref: reference }, MessageResponseSchema, {
        token,
      })
    );
  }

  async sharedInfo(username: string, reference: string): Promise<SharedPodInfo> {
    const token = this.tokenFor(username);
    const res = await this.call(() =>
      this.executor.get('/pod/receiveinfo', { sharing_ref: reference }, ReceiveInfoResponseSchema, {
        token,
      })
    );
    return {
      name: res.pod_name,
      address: res.pod_address,
      username: res.user_name,
      userAddress: res.user_address,
      sharedTime: res.shared_time,
    };
  }

  private async postMessage(username: string, path: string, body: object): Promise<void> {
    const token = this.tokenFor(username);
    await this.call(() => this.executor.post(path, body, MessageResponseSchema, { token }));
  }
}

/**
 * Creates a pod service.
 */
export function createPodService(context: ServiceContext): PodService {
  return new DefaultPodService(context);
}
