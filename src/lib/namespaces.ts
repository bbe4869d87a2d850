import * as k8s from '@kubernetes/client-node'
import { FetchError, getErrorMessage } from './errors'
import { Config, Resource } from './types'

export type NamespaceLister = {
  listNamespace(): Promise<{ body: k8s.V1NamespaceList }>
}

export const createCoreApi = (kubeconfig?: string): NamespaceLister => {
  const kubeConfig = new k8s.KubeConfig()
  if (kubeconfig) {
    kubeConfig.loadFromFile(kubeconfig)
  } else {
    kubeConfig.loadFromDefault()
  }
  return kubeConfig.makeApiClient(k8s.CoreV1Api)
}

export const toResource = (
  namespace: k8s.V1Namespace,
  parentAnnotation: string
): Resource | null => {
  const name = namespace.metadata?.name
  if (!name) {
    return null
  }
  const parentName = namespace.metadata?.annotations?.[parentAnnotation]

  return parentName ? { name, parentName } : { name }
}

export const fetchResources = async (
  {
    kubeconfig,
    parentAnnotation
  }: Pick<Config, 'kubeconfig' | 'parentAnnotation'>,
  createApi: (kubeconfig?: string) => NamespaceLister = createCoreApi
): Promise<Resource[]> => {
  let items: k8s.V1Namespace[]

  try {
    const api = createApi(kubeconfig)
    items = (await api.listNamespace()).body.items
  } catch (e) {
    throw new FetchError(`Failed to list namespaces: ${getErrorMessage(e)}`, e)
  }

  return items
    .map((namespace) => toResource(namespace, parentAnnotation))
    .filter((resource): resource is Resource => resource !== null)
}
