export interface Task {
  id: string;
  title: string;
  status: string; // Lowercased tracker status; never 'closed' once ingested
  type: string;
  priority: number; // 0 = critical, higher = less urgent
  description: string;
  dependsOn: string[]; // Task IDs this depends on
  labels: string[];
  parent: string | null;
}

export interface MalformedTask {
  index: number; // Position in the input list
  id?: string;
  reason: string;
}
