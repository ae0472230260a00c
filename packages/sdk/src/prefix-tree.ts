/**
 * Prefix-tree grouping: groups names by their most descriptive common
 * prefix made of whole words
 *
 * Names are split into words and stored in a trie. Walking the trie, every
 * branching point decides whether the names below it share a prefix worth a
 * group of its own or should be handed up to a shorter prefix.
 *
 * @example
 * ```typescript
 * groupNamesByPrefix(["net_rx_bytes", "net_rx_bytes_total", "disk_read", "disk_write"]);
 * // Map { "net_rx_bytes" => [...], "disk" => ["disk_read", "disk_write"] }
 * ```
 */

import type { Grouping, Name } from "./types.js";
import { DEFAULT_DELIMITER } from "./grouper.js";

/**
 * A single word of a name stored in the trie
 */
export interface WordTrieNode {
  /** The word stored in the node ("" for the root) */
  word: string;
  /** Words joined from the root down to this node */
  text: string;
  /** Whether a name ends at this node */
  isFullName: boolean;
  children: Map<string, WordTrieNode>;
}

function createNode(word: string, text: string): WordTrieNode {
  return { word, text, isFullName: false, children: new Map() };
}

/**
 * Trie of words built from delimited names
 */
export class WordTrie {
  readonly root: WordTrieNode = createNode("", "");
  readonly delimiter: string;

  constructor(delimiter: string = DEFAULT_DELIMITER) {
    this.delimiter = delimiter;
  }

  static fromNames(names: readonly Name[], delimiter: string = DEFAULT_DELIMITER): WordTrie {
    const trie = new WordTrie(delimiter);
    for (const name of names) {
      trie.insert(name);
    }
    return trie;
  }

  /**
   * Insert a name; inserting the same name again has no effect
   */
  insert(name: Name): void {
    const words = name.split(this.delimiter);
    let node = this.root;

    words.forEach((word, i) => {
      let child = node.children.get(word);
      if (!child) {
        child = createNode(word, words.slice(0, i + 1).join(this.delimiter));
        node.children.set(word, child);
      }
      node = child;
    });

    node.isFullName = true;
  }

  /**
   * Group every name in the trie
   *
   * Names that share no prefix with any other name end up in a group of
   * their own, keyed by the name itself.
   */
  group(): Grouping {
    const grouping: Grouping = new Map();

    const addGroup = (key: string, names: Name[]): void => {
      const existing = grouping.get(key);
      if (existing) {
        existing.push(...names);
      } else {
        grouping.set(key, [...names]);
      }
    };

    // Collects the full names of a non-branching chain into `branch`; the
    // finished branch is appended to `branches` of the nearest branching point
    const visit = (node: WordTrieNode, branch: Name[], branches: Name[][]): void => {
      if (node.children.size > 1) {
        if (branch.length > 0) {
          branches.push(branch);
        }
        collectBranchingPoint(node, branches, false);
        return;
      }

      if (node.isFullName) {
        branch.push(node.text);
      }

      const [onlyChild] = node.children.values();
      if (onlyChild === undefined) {
        branches.push(branch);
        return;
      }
      visit(onlyChild, branch, branches);
    };

    const collectBranchingPoint = (node: WordTrieNode, branches: Name[][], isRoot: boolean): void => {
      const subBranches: Name[][] = [];
      for (const child of node.children.values()) {
        visit(child, [], subBranches);
      }

      // A branch with several names is grouped under its first (shortest) name
      const singles: Name[] = [];
      for (const subBranch of subBranches) {
        const [first, ...rest] = subBranch;
        if (first === undefined) continue;
        if (rest.length > 0) {
          addGroup(first, subBranch);
        } else {
          singles.push(first);
        }
      }

      if (isRoot) {
        for (const name of singles) {
          addGroup(name, [name]);
        }
        return;
      }

      if (node.isFullName || singles.length > 1) {
        addGroup(node.text, node.isFullName ? [node.text, ...singles] : singles);
        return;
      }

      // One lone name left: let a shorter prefix decide
      if (singles.length > 0) {
        branches.push(singles);
      }
    };

    collectBranchingPoint(this.root, [], true);
    return grouping;
  }
}

/**
 * Group names by their most descriptive common prefix of whole words
 *
 * Duplicate names are grouped once.
 */
export function groupNamesByPrefix(
  names: readonly Name[],
  delimiter: string = DEFAULT_DELIMITER
): Grouping {
  return WordTrie.fromNames(names, delimiter).group();
}
