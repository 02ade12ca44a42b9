import { Box, Text, useApp, useInput, useStdin } from 'ink';
import { useEffect, useRef, useState } from 'react';

import { errorMessage } from '@/farm/errors';
import { type FarmReport, type FarmSummary, summarizeReport } from '@/farm/operations';
import {
  type ProgressLine,
  progressMarker,
  stepKey,
  toProgressLine,
} from '@/farm/progress';
import type { FarmEvent, FarmReporter } from '@/farm/types';

type Stage = 'running' | 'summary' | 'fatal';

type FarmApplicationProps = {
  title: string;
  configPath: string;
  emoji: boolean;
  run: (reporter: FarmReporter, signal: AbortSignal) => Promise<FarmReport>;
  onComplete: (code: number) => void;
};

const SPINNER_FRAMES = ['-', '\\', '|', '/'];

const COLORS = {
  amber: '#f2a541',
  cyan: '#61dafb',
  steel: '#8ea0b2',
  muted: '#6b7280',
  danger: '#ff6b6b',
  success: '#6ee7b7',
};

const TONE_COLORS: Record<ProgressLine['tone'], string> = {
  success: COLORS.success,
  failure: COLORS.danger,
  skipped: COLORS.muted,
};

export const FarmApplication = ({
  title,
  configPath,
  emoji,
  run,
  onComplete,
}: FarmApplicationProps) => {
  const { exit } = useApp();
  const { isRawModeSupported } = useStdin();

  const [stage, setStage] = useState<Stage>('running');
  const [spinnerTick, setSpinnerTick] = useState(0);
  const [lines, setLines] = useState<ProgressLine[]>([]);
  const [active, setActive] = useState<Map<string, string>>(new Map());
  const [summary, setSummary] = useState<FarmSummary | null>(null);
  const [fatalError, setFatalError] = useState<string | null>(null);
  const [cancelling, setCancelling] = useState(false);

  const controllerRef = useRef(new AbortController());
  const eventCountRef = useRef(0);
  const finalizedRef = useRef(false);

  useEffect(() => {
    if (stage !== 'running') {
      return;
    }

    const timer = setInterval(() => {
      setSpinnerTick((value) => (value + 1) % SPINNER_FRAMES.length);
    }, 110);

    return () => clearInterval(timer);
  }, [stage]);

  useEffect(() => {
    const reporter: FarmReporter = {
      emit: (event: FarmEvent) => {
        if (event.type === 'step-started') {
          const key = stepKey(event.category, event.repository, event.step);
          setActive((value) => new Map(value).set(key, `${event.repository}: ${event.step}`));
          return;
        }

        if (event.type === 'step-finished') {
          const key = stepKey(event.category, event.repository, event.step);
          setActive((value) => {
            const next = new Map(value);
            next.delete(key);
            return next;
          });
        }

        const line = toProgressLine(event, eventCountRef.current);
        eventCountRef.current += 1;
        if (line) {
          setLines((value) => [...value, line]);
        }
      },
    };

    const execute = async () => {
      try {
        const report = await run(reporter, controllerRef.current.signal);
        setSummary(summarizeReport(report));
        setStage('summary');
      } catch (error) {
        setFatalError(errorMessage(error));
        setStage('fatal');
      }
    };

    void execute();
  }, [run]);

  useEffect(() => {
    if (stage === 'running' || finalizedRef.current) {
      return;
    }
    finalizedRef.current = true;

    if (stage === 'fatal') {
      onComplete(1);
    } else {
      onComplete(summary?.cancelled ? 130 : 0);
    }
    exit();
  }, [stage, summary, onComplete, exit]);

  useInput(
    (input, key) => {
      if (key.ctrl && input === 'c' && !cancelling) {
        setCancelling(true);
        controllerRef.current.abort();
      }
    },
    { isActive: isRawModeSupported && stage === 'running' },
  );

  const renderHeader = () => (
    <Box borderStyle="round" borderColor={COLORS.amber} flexDirection="column" paddingX={1}>
      <Text color={COLORS.amber} bold>
        repofarm :: {title}
      </Text>
      <Text color={COLORS.steel}>config: {configPath}</Text>
    </Box>
  );

  const renderLines = () => (
    <Box flexDirection="column" marginTop={1}>
      {lines.map((line) => (
        <Text key={line.id} color={TONE_COLORS[line.tone]}>
          {progressMarker(line.tone, emoji)} {line.label}
          {line.detail ? <Text color={COLORS.muted}> :: {line.detail}</Text> : null}
        </Text>
      ))}
      {[...active].map(([key, label]) => (
        <Text key={key} color={COLORS.cyan}>
          [{SPINNER_FRAMES[spinnerTick]}] {label}
        </Text>
      ))}
      {cancelling && stage === 'running' ? (
        <Text color={COLORS.amber}>cancelling after the running steps finish...</Text>
      ) : null}
    </Box>
  );

  const renderSummary = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.success} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.success}>Summary</Text>
      <Text color={COLORS.success}>succeeded: {summary?.succeeded ?? 0}</Text>
      <Text color={(summary?.failed ?? 0) > 0 ? COLORS.danger : COLORS.steel}>failed: {summary?.failed ?? 0}</Text>
      <Text color={COLORS.muted}>not permitted: {summary?.denied ?? 0}</Text>
      {summary?.cancelled ? <Text color={COLORS.amber}>cancelled before completion</Text> : null}
    </Box>
  );

  const renderFatal = () => (
    <Box marginTop={1} borderStyle="round" borderColor={COLORS.danger} paddingX={1} flexDirection="column">
      <Text bold color={COLORS.danger}>{title} failed</Text>
      <Text color={COLORS.steel}>{fatalError}</Text>
    </Box>
  );

  return (
    <Box flexDirection="column" paddingX={1}>
      {renderHeader()}
      {renderLines()}
      {stage === 'summary' && renderSummary()}
      {stage === 'fatal' && renderFatal()}
    </Box>
  );
};
