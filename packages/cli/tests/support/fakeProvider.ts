import type { IProvider } from '@skyform/contracts';
import { vi } from 'vitest';

export function createFakeProvider() {
  return {
    resources: ['apig_signature_associate'],
    dataSources: ['swr_image_triggers'],
    getSchema: vi.fn<Parameters<IProvider['getSchema']>, ReturnType<IProvider['getSchema']>>(),
    validate: vi.fn<Parameters<IProvider['validate']>, ReturnType<IProvider['validate']>>(),
    create: vi.fn<Parameters<IProvider['create']>, ReturnType<IProvider['create']>>(),
    read: vi.fn<Parameters<IProvider['read']>, ReturnType<IProvider['read']>>(),
    update: vi.fn<Parameters<IProvider['update']>, ReturnType<IProvider['update']>>(),
    delete: vi.fn<Parameters<IProvider['delete']>, ReturnType<IProvider['delete']>>(),
    importResource: vi.fn<Parameters<IProvider['importResource']>, ReturnType<IProvider['importResource']>>(),
    readDataSource: vi.fn<Parameters<IProvider['readDataSource']>, ReturnType<IProvider['readDataSource']>>(),
  } satisfies IProvider;
}

export type FakeProvider = ReturnType<typeof createFakeProvider>;
