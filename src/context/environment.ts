import { ProjectDetector, type LocalProjectContext } from "./project.js";
import { readRecentCommands } from "./shellHistory.js";

export interface EnvironmentContext {
  project: LocalProjectContext | null;
  recentCommands: string[];
}

/** Gathers what the generator should know about the user's surroundings */
export interface EnvironmentSource {
  gather(cwd: string): EnvironmentContext;
}

export interface LocalEnvironmentOptions {
  shell: string;
  /** The user's home directory, where shell history files live */
  userHome: string;
  /** 0 leaves shell history out */
  historyCount: number;
  detector?: ProjectDetector;
}

export class LocalEnvironmentSource implements EnvironmentSource {
  private readonly detector: ProjectDetector;

  constructor(private readonly options: LocalEnvironmentOptions) {
    this.detector = options.detector ?? new ProjectDetector();
  }

  gather(cwd: string): EnvironmentContext {
    return {
      project: this.detector.detect(cwd),
      recentCommands: readRecentCommands({
        shell: this.options.shell,
        homeDir: this.options.userHome,
        count: this.options.historyCount,
      }),
    };
  }
}
