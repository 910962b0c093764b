import { describe, expect, it } from "vitest";
import { makeProject, makeUser, memoryRepos } from "../testing/fixtures";

describe("ProjectRepo", () => {
  it("round-trips a project", () => {
    const { repos } = memoryRepos();
    const project = makeProject({ billable: false, status: "archived" });
    repos.projects.insert([project]);
    expect(repos.projects.getOne({ id: 10 })).toEqual(project);
  });

  it("keeps the first stored version of an id", () => {
    const { repos } = memoryRepos();
    const first = makeProject({ name: "Website" });
    repos.projects.insert([first]);
    repos.projects.insert([makeProject({ name: "Website v2", status: "archived" })]);

    expect(repos.projects.get()).toEqual([first]);
  });

  it("adds new ids next to existing ones", () => {
    const { repos } = memoryRepos();
    repos.projects.insert([makeProject({ id: 10 })]);
    repos.projects.insert([makeProject({ id: 10, name: "Renamed" }), makeProject({ id: 20, name: "Mobile" })]);

    expect(repos.projects.get().map(p => [p.id, p.name])).toEqual([
      [10, "Website"],
      [20, "Mobile"],
    ]);
  });
});

describe("UserRepo", () => {
  it("round-trips and replaces users by id", () => {
    const { repos } = memoryRepos();
    repos.users.insert([makeUser()]);
    repos.users.insert([makeUser({ name: "Ada L." })]);

    expect(repos.users.get()).toEqual([makeUser({ name: "Ada L." })]);
    expect(repos.users.getOne({ email: "ada@example.com" })?.timeZone).toBe("Europe/London");
  });
});
