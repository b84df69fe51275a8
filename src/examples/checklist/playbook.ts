// Run with: playbook ./dist/examples/checklist/playbook.js:release
import { statSync } from 'node:fs';
import { Transition, type StepContext } from '../../types/contracts.js';
import { Step } from '../../orchestrator/step.js';
import { serial } from '../../orchestrator/serial.js';
import { Confirm } from '../../tasks/confirm.js';
import { PathPrompt } from '../../tasks/path.js';

class TagRelease extends Step {
  readonly description = `
    Tag the release commit.

    Run \`git tag -s vX.Y.Z\` on the commit that bumped the version, then push
    the tag with \`git push --tags\`.`;

  async execute(_ctx: StepContext): Promise<Transition> {
    return Transition.CONTINUE;
  }
}

class ChooseArtifact extends PathPrompt {
  readonly description = 'Enter the path of the built release tarball.';

  acceptPath(path: string): Transition {
    if (!statSync(path).isFile()) {
      console.log(`${path} is not a file`);
      return Transition.RETRY;
    }
    console.log(`uploading ${path}`);
    return Transition.CONTINUE;
  }
}

export const release = serial('Cut and publish a release.', [
  new TagRelease(),
  new Confirm(),
  new ChooseArtifact(),
  new Confirm({ prompt: 'announce the release? (y|n) ' }),
]);

export default release;
