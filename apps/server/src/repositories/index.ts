import type { StateDb } from "../db";
import { ActivityRepo } from "./activityRepo";
import { ProjectRepo } from "./projectRepo";
import { UserRepo } from "./userRepo";

export type Repositories = {
  activities: ActivityRepo;
  projects: ProjectRepo;
  users: UserRepo;
};

export const createRepositories = (db: StateDb): Repositories => ({
  activities: new ActivityRepo(db),
  projects: new ProjectRepo(db),
  users: new UserRepo(db),
});

export function createAllTables(repos: Repositories) {
  repos.activities.createTable();
  repos.projects.createTable();
  repos.users.createTable();
}

export { ActivityRepo, ProjectRepo, UserRepo };
