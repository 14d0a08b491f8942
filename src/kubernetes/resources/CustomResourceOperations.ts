import type { CustomObjectsApi } from '@kubernetes/client-node';
import type { Logger } from 'winston';
import { convertApiError, isRecord } from '../ErrorHandling.js';
import type { ResourceReader } from '../ClusterConnection.js';
import {
  describeDescriptor,
  isNamespaced,
  pluralOf,
  type ResourceDescriptor,
} from '../ResourceDescriptor.js';
import type { ResourceObject } from '../utils/ObjectAccessors.js';

export type CustomObjectsClient = Pick<
  CustomObjectsApi,
  | 'listClusterCustomObject'
  | 'listNamespacedCustomObject'
  | 'getClusterCustomObject'
  | 'getNamespacedCustomObject'
>;

/**
 * Read-only custom resource access keyed by ResourceDescriptor
 */
export class CustomResourceOperations implements ResourceReader {
  constructor(
    private readonly api: CustomObjectsClient,
    private readonly logger?: Logger,
  ) {}

  /**
   * List objects of a kind. Cluster-scoped kinds ignore the namespace.
   */
  async list(descriptor: ResourceDescriptor, namespace?: string): Promise<ResourceObject[]> {
    const plural = pluralOf(descriptor);
    const scoped = isNamespaced(descriptor) && namespace ? namespace : undefined;

    try {
      const response = scoped
        ? await this.api.listNamespacedCustomObject(
            descriptor.group,
            descriptor.version,
            scoped,
            plural,
          )
        : await this.api.listClusterCustomObject(descriptor.group, descriptor.version, plural);

      const items = isRecord(response.body) ? response.body.items : undefined;
      const objects = Array.isArray(items) ? items.filter(isRecord) : [];
      this.logger?.debug(
        `Listed ${objects.length} ${plural}.${descriptor.group}${scoped ? ` in ${scoped}` : ''}`,
      );
      return objects;
    } catch (error) {
      throw convertApiError(error, {
        operation: 'list',
        resource: describeDescriptor(descriptor),
        namespace: scoped,
      });
    }
  }

  /**
   * Get one object by name
   */
  async get(
    descriptor: ResourceDescriptor,
    name: string,
    namespace?: string,
  ): Promise<ResourceObject> {
    const plural = pluralOf(descriptor);
    const namespaced = isNamespaced(descriptor);
    const scope = namespaced ? namespace || 'default' : undefined;

    try {
      const response = scope
        ? await this.api.getNamespacedCustomObject(
            descriptor.group,
            descriptor.version,
            scope,
            plural,
            name,
          )
        : await this.api.getClusterCustomObject(descriptor.group, descriptor.version, plural, name);

      if (!isRecord(response.body)) {
        throw new Error(`Unexpected response body for ${plural}/${name}`);
      }
      return response.body;
    } catch (error) {
      throw convertApiError(error, {
        operation: 'get',
        resource: descriptor.kind,
        name,
        namespace: scope,
      });
    }
  }
}
