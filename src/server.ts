import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SERVER_INFO } from "./config.js";
import {
  WorkoutToolset,
  logWorkoutShape,
  onboardingShape,
  settingsShape,
  timerActionShape,
  type WorkoutToolResult
} from "./tools/workoutTool.js";
import { buildWorkoutStructuredContent } from "./ui/builders.js";

export function createWorkoutServer(toolset: WorkoutToolset): McpServer {
  const server = new McpServer(
    {
      name: SERVER_INFO.name,
      version: SERVER_INFO.version
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    "workout_timer",
    {
      title: "Workout timer",
      description: "Start, pause, resume, skip, reset or check the interval workout.",
      inputSchema: timerActionShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => buildResult(await toolset.timer(input), toolset)
  );

  server.registerTool(
    "workout_settings",
    {
      title: "Workout settings",
      description: "Change interval counts and durations, alarm, notifications, reminder schedule and health sync.",
      inputSchema: settingsShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => buildResult(await toolset.updateSettings(input), toolset)
  );

  server.registerTool(
    "workout_log",
    {
      title: "Workout log",
      description: "List logged workouts, or save the finished workout and start a fresh session.",
      inputSchema: logWorkoutShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => buildResult(await toolset.logWorkout(input), toolset)
  );

  server.registerTool(
    "workout_permissions",
    {
      title: "Permissions",
      description: "Re-check notification and health permissions and reschedule reminders.",
      annotations: {
        readOnlyHint: false
      }
    },
    async () => buildResult(await toolset.refreshPermissions(), toolset)
  );

  server.registerTool(
    "workout_guidance",
    {
      title: "Heart rate guidance",
      description: "How the 4x4 protocol works, heart rate targets for the configured age and recent VO2 max samples.",
      annotations: {
        readOnlyHint: true
      }
    },
    async () => {
      const result = await toolset.guidance();
      return {
        content: [{ type: "text" as const, text: result.message }],
        structuredContent: {
          heartRate: result.heartRate,
          vo2Max: [...result.vo2Max],
          guide: result.guide
        }
      };
    }
  );

  server.registerTool(
    "workout_onboarding",
    {
      title: "Onboarding",
      description: "Step through the first-run guide.",
      inputSchema: onboardingShape,
      annotations: {
        readOnlyHint: false
      }
    },
    async input => {
      const result = await toolset.onboardingStep(input);
      return {
        content: [{ type: "text" as const, text: result.message }],
        structuredContent: {
          step: result.step,
          progress: result.progress,
          completed: result.completed
        }
      };
    }
  );

  return server;
}

function buildResult(result: WorkoutToolResult, toolset: WorkoutToolset) {
  return {
    content: [
      {
        type: "text" as const,
        text: result.message
      }
    ],
    structuredContent: buildWorkoutStructuredContent({
      state: result.state,
      entries: result.entries,
      reminders: toolset.reminders()
    })
  };
}
