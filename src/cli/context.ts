import { AurClient } from '../core/aur';
import { MakepkgBuilder } from '../core/builder';
import { InstallOrchestrator } from '../core/installer';
import { PacmanGateway } from '../core/pacman';
import { DependencyResolver } from '../core/resolver';
import { UpgradePlanner } from '../core/upgrade';
import type { Config, NativeGateway, RemoteIndex } from '../types';
import {
    createPromptDecisions,
    createSpinnerProgress,
    createUnattendedDecisions,
} from './prompts';

interface AppContext {
    config: Config;
    native: NativeGateway;
    remote: RemoteIndex;
    installer: InstallOrchestrator;
    planner: UpgradePlanner;
}

const createContext = (config: Config): AppContext => {
    const interactive = !config.autorun && process.stdin.isTTY === true;
    const decisions = interactive
        ? createPromptDecisions()
        : createUnattendedDecisions();
    const native = new PacmanGateway(config);
    const remote = new AurClient(config.aurUrl);
    const resolver = new DependencyResolver(native, remote);
    const installer = new InstallOrchestrator({
        config,
        native,
        remote,
        resolver,
        builder: new MakepkgBuilder(config),
        decisions,
        progress: createSpinnerProgress(),
    });
    const planner = new UpgradePlanner({ native, remote, installer, decisions });
    return { config, native, remote, installer, planner };
};

export { createContext };
export type { AppContext };
