/**
 * In-memory folder/file index built from an archive header.
 *
 * Nodes live in a flat arena addressed by numeric ids. Children are owned by
 * the arena; a node's parent is stored as an id, so there are no reference
 * cycles. Name and path comparison is case-insensitive.
 */
import { DuplicateEntryError } from './errors.js';
import { pathKey } from './utils/paths.js';

export type NodeId = number;

export interface FolderNode {
  readonly kind: 'folder';
  readonly id: NodeId;
  readonly name: string;
  /** '/'-separated path from the root; empty for the root itself. */
  readonly path: string;
  readonly parent: NodeId | null;
  /** Lower-cased name → file node id. */
  readonly files: Map<string, NodeId>;
  /** Lower-cased name → folder node id. */
  readonly subfolders: Map<string, NodeId>;
}

export interface FileNode {
  readonly kind: 'file';
  readonly id: NodeId;
  readonly name: string;
  readonly path: string;
  readonly parent: NodeId;
  readonly dataOffset: number;
  readonly dataLength: number;
}

export type TreeNode = FolderNode | FileNode;

export class FileTree {
  static readonly ROOT: NodeId = 0;

  private readonly nodes: TreeNode[] = [];
  private fileTotal = 0;

  constructor() {
    this.nodes.push({
      kind: 'folder',
      id: FileTree.ROOT,
      name: '',
      path: '',
      parent: null,
      files: new Map(),
      subfolders: new Map(),
    });
  }

  get root(): FolderNode {
    return this.folder(FileTree.ROOT);
  }

  /** Number of file (leaf) nodes. */
  get fileCount(): number {
    return this.fileTotal;
  }

  /** Number of folder nodes, excluding the root. */
  get folderCount(): number {
    return this.nodes.length - 1 - this.fileTotal;
  }

  node(id: NodeId): TreeNode {
    const node = this.nodes[id];
    if (!node) {
      throw new RangeError(`Unknown node id ${id}`);
    }
    return node;
  }

  folder(id: NodeId): FolderNode {
    const node = this.node(id);
    if (node.kind !== 'folder') {
      throw new RangeError(`Node ${id} (${node.path}) is not a folder`);
    }
    return node;
  }

  parentOf(id: NodeId): FolderNode | null {
    const parent = this.node(id).parent;
    return parent === null ? null : this.folder(parent);
  }

  /**
   * Inserts a folder and any missing ancestors. Inserting an existing
   * folder path returns the existing node.
   * @throws {DuplicateEntryError} If the path or an ancestor is a file
   */
  addFolder(relPath: string): FolderNode {
    let current = this.root;
    for (const name of relPath.split('/')) {
      const key = pathKey(name);
      if (current.files.has(key)) {
        throw new DuplicateEntryError(relPath, `"${joinPath(current.path, name)}" is already a file`);
      }
      const existing = current.subfolders.get(key);
      if (existing !== undefined) {
        current = this.folder(existing);
        continue;
      }
      const created: FolderNode = {
        kind: 'folder',
        id: this.nodes.length,
        name,
        path: joinPath(current.path, name),
        parent: current.id,
        files: new Map(),
        subfolders: new Map(),
      };
      this.nodes.push(created);
      current.subfolders.set(key, created.id);
      current = created;
    }
    return current;
  }

  /**
   * Attaches a file to its immediate parent, creating parent folders as needed.
   * @throws {DuplicateEntryError} If the path is already a folder or a file
   */
  addFile(relPath: string, dataOffset: number, dataLength: number): FileNode {
    const slash = relPath.lastIndexOf('/');
    const parent = slash === -1 ? this.root : this.addFolder(relPath.slice(0, slash));
    const name = relPath.slice(slash + 1);
    const key = pathKey(name);
    if (parent.subfolders.has(key)) {
      throw new DuplicateEntryError(relPath, 'already a folder');
    }
    if (parent.files.has(key)) {
      throw new DuplicateEntryError(relPath, 'already a file');
    }
    const file: FileNode = {
      kind: 'file',
      id: this.nodes.length,
      name,
      path: joinPath(parent.path, name),
      parent: parent.id,
      dataOffset,
      dataLength,
    };
    this.nodes.push(file);
    parent.files.set(key, file.id);
    this.fileTotal += 1;
    return file;
  }

  /**
   * Case-insensitive lookup. An empty path yields the root.
   */
  find(relPath: string): TreeNode | undefined {
    if (relPath === '') {
      return this.root;
    }
    let current: FolderNode = this.root;
    const names = relPath.split('/');
    for (let i = 0; i < names.length; i++) {
      const key = pathKey(names[i]);
      const isLast = i === names.length - 1;
      const folderId = current.subfolders.get(key);
      if (folderId !== undefined) {
        if (isLast) {
          return this.node(folderId);
        }
        current = this.folder(folderId);
        continue;
      }
      const fileId = current.files.get(key);
      return isLast && fileId !== undefined ? this.node(fileId) : undefined;
    }
    return undefined;
  }

  /** File nodes in insertion order. */
  *files(): IterableIterator<FileNode> {
    for (const node of this.nodes) {
      if (node.kind === 'file') {
        yield node;
      }
    }
  }

  /** Folder nodes in insertion order, excluding the root. */
  *folders(): IterableIterator<FolderNode> {
    for (const node of this.nodes) {
      if (node.kind === 'folder' && node.id !== FileTree.ROOT) {
        yield node;
      }
    }
  }
}

function joinPath(parentPath: string, name: string): string {
  return parentPath ? `${parentPath}/${name}` : name;
}
