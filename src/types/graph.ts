import type { Task } from './task.js';

export interface DependencyGraph {
  nodes: string[]; // Input order
  adjacency: Map<string, Set<string>>; // id -> ids it depends on
  reverseAdjacency: Map<string, Set<string>>; // id -> ids that depend on it
  tasks: Map<string, Task>;
}
