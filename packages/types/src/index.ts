export interface Todo {
  id: number;
  userId: number;
  title: string;
  completed: boolean;
}

export interface User {
  id: number;
  name?: string | null;
  username?: string | null;
  email?: string | null;
}

export interface HealthStatus {
  status: "healthy";
  database: "connected";
  application: "running";
  timestamp: string;
}

export interface UsersResponse {
  count?: number;
  users: User[];
}

export interface ErrorBody {
  error: string;
}
