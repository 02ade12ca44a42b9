import { render } from 'ink';

import type { FarmReport } from '@/farm/operations';
import type { FarmReporter } from '@/farm/types';
import { FarmApplication } from '@/farm/ui/farm.application';

export const runFarmInkApplication = async (props: {
  title: string;
  configPath: string;
  emoji: boolean;
  run: (reporter: FarmReporter, signal: AbortSignal) => Promise<FarmReport>;
}): Promise<number> => {
  let exitCode = 0;

  const { waitUntilExit } = render(
    <FarmApplication
      {...props}
      onComplete={(code) => {
        exitCode = code;
      }}
    />,
    { exitOnCtrlC: false },
  );

  await waitUntilExit();
  return exitCode;
};
