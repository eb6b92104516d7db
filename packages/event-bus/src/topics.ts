export const Topics = {
  ANIMATOR_COMMAND: "ANIMATOR.COMMAND",

  ANIMATOR_REMOVE_STARTING: "ANIMATOR.REMOVE_STARTING",
  ANIMATOR_REMOVE_FINISHED: "ANIMATOR.REMOVE_FINISHED",
  ANIMATOR_ADD_STARTING: "ANIMATOR.ADD_STARTING",
  ANIMATOR_ADD_FINISHED: "ANIMATOR.ADD_FINISHED",
  ANIMATOR_MOVE_STARTING: "ANIMATOR.MOVE_STARTING",
  ANIMATOR_MOVE_FINISHED: "ANIMATOR.MOVE_FINISHED",
  ANIMATOR_CHANGE_STARTING: "ANIMATOR.CHANGE_STARTING",
  ANIMATOR_CHANGE_FINISHED: "ANIMATOR.CHANGE_FINISHED",
  ANIMATOR_ANIMATIONS_FINISHED: "ANIMATOR.ANIMATIONS_FINISHED",

  LOG_EVENT: "LOG.EVENT"
} as const;
