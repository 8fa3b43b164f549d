export const ONBOARDING_STEPS = ["welcome", "structure", "notifications", "reminderDay", "health", "launch"] as const;

export type OnboardingStep = (typeof ONBOARDING_STEPS)[number];

const STEP_TITLES: Record<OnboardingStep, string> = {
  welcome: "Welcome",
  structure: "Train with purpose",
  notifications: "Stay consistent",
  reminderDay: "Pick your workout day",
  health: "Track your progress",
  launch: "You're ready"
};

export class OnboardingFlow {
  private index = 0;

  get currentStep(): OnboardingStep {
    return ONBOARDING_STEPS[this.index] ?? "welcome";
  }

  get title(): string {
    return STEP_TITLES[this.currentStep];
  }

  get progressText(): string {
    return `${this.index + 1} of ${ONBOARDING_STEPS.length}`;
  }

  get isLastStep(): boolean {
    return this.index === ONBOARDING_STEPS.length - 1;
  }

  next(): OnboardingStep {
    this.index = Math.min(this.index + 1, ONBOARDING_STEPS.length - 1);
    return this.currentStep;
  }

  back(): OnboardingStep {
    this.index = Math.max(this.index - 1, 0);
    return this.currentStep;
  }

  goTo(step: OnboardingStep): OnboardingStep {
    this.index = ONBOARDING_STEPS.indexOf(step);
    return this.currentStep;
  }
}
