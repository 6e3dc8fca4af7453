import type { WireDocument, WireResource } from "./schema.js";
import { ResourceNode } from "./resource-node.js";

/**
 * Every resource node one document makes available to inline resolution:
 * its primary data and its `included` section, keyed by identity.
 * Primary data wins over an included node with the same identity.
 */
export class DocumentScope {
  readonly primary: readonly ResourceNode[];
  readonly included: readonly ResourceNode[];
  private readonly nodes = new Map<string, ResourceNode>();

  constructor(primary: readonly WireResource[], included: readonly WireResource[] = []) {
    this.included = included.map((resource) => new ResourceNode(resource));
    this.primary = primary.map((resource) => new ResourceNode(resource));

    for (const node of this.included) {
      this.nodes.set(node.key, node);
    }
    for (const node of this.primary) {
      this.nodes.set(node.key, node);
    }
  }

  static fromDocument(document: WireDocument, primary: readonly WireResource[]): DocumentScope {
    return new DocumentScope(primary, document.included);
  }

  find(key: string): ResourceNode | undefined {
    return this.nodes.get(key);
  }
}
