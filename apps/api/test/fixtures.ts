import type { Todo, User } from "@placeholder-api/types";

export const todos: Todo[] = [
  { id: 1, userId: 1, title: "water the plants", completed: false },
  { id: 2, userId: 1, title: "file expenses", completed: true },
  { id: 3, userId: 2, title: "book dentist", completed: false },
];

export const users: User[] = [
  { id: 1, name: "Ada Example", username: "ada", email: "ada@example.test" },
  { id: 2, name: "Bo Sample", username: "bo", email: "bo@example.test" },
];
