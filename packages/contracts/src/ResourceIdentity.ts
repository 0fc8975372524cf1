/**
 * Fully-qualified address of an ARM resource.
 * Child resources keep their type and name segments joined by "/" (e.g. `virtualNetworks/subnets`, `vnet1/default`).
 */
export class ResourceIdentity {
  public readonly subscriptionId: string;
  public readonly resourceGroup: string;
  public readonly namespace: string;
  public readonly resourceType: string;
  public readonly name: string;

  constructor(subscriptionId: string, resourceGroup: string, namespace: string, resourceType: string, name: string) {
    const typeDepth = resourceType.split('/').length;
    const nameDepth = name.split('/').length;
    if (typeDepth !== nameDepth) throw new Error(`Resource type "${resourceType}" and name "${name}" have a different number of segments`);

    this.subscriptionId = subscriptionId;
    this.resourceGroup = resourceGroup;
    this.namespace = namespace;
    this.resourceType = resourceType;
    this.name = name;
  }

  /** Parses `/subscriptions/{s}/resourceGroups/{g}/providers/{namespace}/{type}/{name}[/{type}/{name}...]` */
  static parse(id: string): ResourceIdentity {
    const parts = id.replace(/^\/+/, '').replace(/\/+$/, '').split('/');

    if (parts.length < 8 || parts[0].toLowerCase() !== 'subscriptions' || parts[2].toLowerCase() !== 'resourcegroups' || parts[4].toLowerCase() !== 'providers')
      throw new Error(`Invalid resource id: ${id}`);

    const rest = parts.slice(6);
    if (rest.length % 2 !== 0) throw new Error(`Invalid resource id: ${id} (expected type/name pairs after the provider namespace)`);

    const types: string[] = [];
    const names: string[] = [];
    for (let i = 0; i < rest.length; i += 2) {
      types.push(rest[i]);
      names.push(rest[i + 1]);
    }

    return new ResourceIdentity(parts[1], parts[3], parts[5], types.join('/'), names.join('/'));
  }

  /** Builds an identity from a kind such as `Microsoft.Compute/disks`. */
  static of(subscriptionId: string, resourceGroup: string, kind: string, name: string): ResourceIdentity {
    const slash = kind.indexOf('/');
    if (slash <= 0) throw new Error(`Invalid resource kind: ${kind} (expected Namespace/type)`);

    return new ResourceIdentity(subscriptionId, resourceGroup, kind.slice(0, slash), kind.slice(slash + 1), name);
  }

  get kind(): string {
    return `${this.namespace}/${this.resourceType}`;
  }

  toString(): string {
    const types = this.resourceType.split('/');
    const names = this.name.split('/');
    const pairs = types.map((type, i) => `${type}/${names[i]}`).join('/');
    return `/subscriptions/${this.subscriptionId}/resourceGroups/${this.resourceGroup}/providers/${this.namespace}/${pairs}`;
  }

  /** Lower-cased id, suitable as a map or lock key. */
  get key(): string {
    return this.toString().toLowerCase();
  }

  equals(other: ResourceIdentity): boolean {
    return this.key === other.key;
  }
}
